import type { Database as SqliteDatabase } from "better-sqlite3";
import type { FSWatcher } from "chokidar";
import type { HarvestConfig } from "../config/config.js";
import type { InsertStrategy } from "./schema.js";
import type { Measurement } from "./types.js";
import { resolveBatchPolicy } from "../config/durability.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { openSampleDatabase } from "../store/sqlite.js";
import { FileSetManager } from "./file-set.js";
import { BatchIngester, type IngestStats } from "./ingestor.js";
import { countSamples } from "./schema.js";
import { PollWaker } from "./waker.js";
import { createExportFileWatcher } from "./watcher.js";

const log = createSubsystemLogger("harvest/harvester");

/**
 * Callbacks the process glue can plug into a run.
 */
export type HarvesterHooks = {
  /** Extra stop condition, checked alongside `stop()` */
  shouldStop?: () => boolean;
  /** Called per measurement when `config.progress` is on */
  onProgress?: (measurement: Measurement, stats: IngestStats) => void;
  onCycleComplete?: (cycle: number) => void;
  /** Clock in milliseconds for the commit timer */
  now?: () => number;
};

export type HarvestSummary = {
  attempted: number;
  written: number;
  files: number;
  strategy: InsertStrategy;
};

export type HarvestStatus = {
  directory: string;
  dbPath: string;
  running: boolean;
  trackedFiles: number;
  totalSamples: number;
  stats: IngestStats;
};

/**
 * Polls the export directory and stores every new measurement once.
 */
export class Harvester {
  private readonly config: HarvestConfig;
  private readonly hooks: HarvesterHooks;
  private readonly db: SqliteDatabase;
  private readonly ingester: BatchIngester;
  private readonly files: FileSetManager;
  private readonly abort = new AbortController();
  private readonly waker = new PollWaker();
  private watcher: FSWatcher | null = null;
  private running = false;
  private closed = false;

  constructor(config: HarvestConfig, hooks: HarvesterHooks = {}) {
    this.config = config;
    this.hooks = hooks;

    this.db = openSampleDatabase(config.dbPath, config.mode);
    try {
      this.ingester = new BatchIngester(this.db, {
        ...resolveBatchPolicy(config),
        now: hooks.now,
      });
    } catch (err) {
      this.db.close();
      throw err;
    }

    this.files = new FileSetManager({
      directory: config.directory,
      filePrefix: config.filePrefix,
      backfill: config.backfill,
      pollIntervalMs: config.pollIntervalSeconds * 1000,
    });

    log.info("Harvester initialized", {
      directory: config.directory,
      dbPath: config.dbPath,
      mode: config.mode,
      backfill: config.backfill,
      strategy: this.ingester.strategy,
    });
  }

  /**
   * Harvests until stopped, then flushes the last batch and closes the store.
   */
  async run(): Promise<HarvestSummary> {
    if (this.closed) {
      throw new Error("Harvester is closed");
    }
    if (this.running) {
      throw new Error("Harvester is already running");
    }
    this.running = true;

    try {
      if (this.config.wakeOnChange) {
        const watcher = createExportFileWatcher(this.config.directory, this.config.filePrefix, () =>
          this.waker.wake(),
        );
        this.watcher = watcher;
        await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
      }

      const measurements = this.files.watch({
        signal: this.abort.signal,
        shouldStop: this.hooks.shouldStop,
        waker: this.waker,
        onCycleComplete: (cycle) => {
          this.ingester.maybeFlush();
          this.hooks.onCycleComplete?.(cycle);
        },
      });

      for await (const measurement of measurements) {
        this.ingester.ingest(measurement);
        if (this.config.progress) {
          this.hooks.onProgress?.(measurement, this.ingester.stats());
        }
      }
    } finally {
      await this.close();
    }

    const stats = this.ingester.stats();
    log.info("Harvest stopped", { attempted: stats.attempted, written: stats.written });
    return {
      attempted: stats.attempted,
      written: stats.written,
      files: this.files.trackedCount,
      strategy: stats.strategy,
    };
  }

  /**
   * Asks a running harvest to stop after the file it is reading.
   */
  stop(): void {
    if (!this.abort.signal.aborted) {
      log.info("Stop requested, finishing current batch");
      this.abort.abort();
    }
  }

  status(): HarvestStatus {
    if (this.closed) {
      throw new Error("Harvester is closed");
    }
    return {
      directory: this.config.directory,
      dbPath: this.config.dbPath,
      running: this.running,
      trackedFiles: this.files.trackedCount,
      totalSamples: countSamples(this.db),
      stats: this.ingester.stats(),
    };
  }

  /**
   * Flushes pending rows and releases the watcher and database.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.running = false;

    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
    try {
      this.ingester.close();
    } finally {
      this.db.close();
    }
  }
}
