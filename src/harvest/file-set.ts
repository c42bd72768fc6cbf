import fs from "node:fs/promises";
import path from "node:path";
import type { FileTrackingState, Measurement } from "./types.js";
import { DEFAULT_FILE_PREFIX } from "../config/config.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { createFileTrackingState, isExportFileName } from "./file-state.js";
import { errorCode, isTransientFsError } from "./fs-errors.js";
import { primeFileState, readNewMeasurements } from "./tail-reader.js";
import { PollWaker } from "./waker.js";

const log = createSubsystemLogger("harvest/file-set");

/**
 * Options for the file set manager.
 */
export type FileSetOptions = {
  /** Directory holding the export files */
  directory: string;
  /** Export file name prefix */
  filePrefix?: string;
  /** Read existing file content when a file is first seen instead of starting at its end */
  backfill?: boolean;
  /** Delay between poll cycles */
  pollIntervalMs: number;
};

/**
 * Options for one `watch()` run.
 */
export type WatchOptions = {
  /** Sampled before each cycle, between files and before sleeping */
  shouldStop?: () => boolean;
  /** Aborting counts as a stop request and cuts the current sleep short */
  signal?: AbortSignal;
  /** Runs after every file of a cycle has been read and its measurements yielded */
  onCycleComplete?: (cycle: number) => void;
  /** Lets a change watcher end the sleep early */
  waker?: PollWaker;
};

/**
 * Tracks every export file in one directory and reads what was appended to each.
 */
export class FileSetManager {
  private readonly directory: string;
  private readonly filePrefix: string;
  private readonly backfill: boolean;
  private readonly pollIntervalMs: number;
  private readonly tracked = new Map<string, FileTrackingState>();

  constructor(options: FileSetOptions) {
    this.directory = options.directory;
    this.filePrefix = options.filePrefix ?? DEFAULT_FILE_PREFIX;
    this.backfill = options.backfill ?? false;
    this.pollIntervalMs = options.pollIntervalMs;
  }

  get trackedCount(): number {
    return this.tracked.size;
  }

  trackedPaths(): string[] {
    return Array.from(this.tracked.keys());
  }

  getState(filePath: string): FileTrackingState | undefined {
    return this.tracked.get(filePath);
  }

  /**
   * Lists export files currently in the directory. A missing directory lists as empty.
   */
  async listExportFiles(): Promise<string[]> {
    let entries: Array<{ name: string; isFile: () => boolean; isSymbolicLink: () => boolean }>;
    try {
      entries = await fs.readdir(this.directory, { withFileTypes: true });
    } catch (err) {
      if (isTransientFsError(err) || errorCode(err) === "ENOTDIR") {
        log.debug(`Cannot list ${this.directory}: ${String(err)}`);
        return [];
      }
      throw err;
    }
    const files: string[] = [];
    for (const entry of entries) {
      if (!isExportFileName(entry.name, this.filePrefix)) {
        continue;
      }
      const filePath = path.join(this.directory, entry.name);
      if (entry.isFile() || (entry.isSymbolicLink() && (await isRegularFile(filePath)))) {
        files.push(filePath);
      }
    }
    return files.sort();
  }

  /**
   * Starts tracking new export files and drops files that no longer exist.
   * Without backfill a file is tracked only once it has been primed; one that
   * is busy or fails to read is left for the next cycle.
   */
  async syncFiles(): Promise<{ added: string[]; removed: string[] }> {
    const present = await this.listExportFiles();
    const seen = new Set(present);
    const added: string[] = [];
    const removed: string[] = [];

    for (const filePath of present) {
      if (this.tracked.has(filePath)) {
        continue;
      }
      const state = createFileTrackingState(filePath, this.filePrefix);
      if (!this.backfill && !(await this.prime(state))) {
        continue;
      }
      this.tracked.set(filePath, state);
      added.push(filePath);
      log.info(`Tracking ${state.origin}`, {
        source: state.source,
        backfill: this.backfill,
        cursor: state.cursor,
      });
    }

    for (const filePath of Array.from(this.tracked.keys())) {
      if (seen.has(filePath) || (await fileExists(filePath))) {
        continue;
      }
      this.tracked.delete(filePath);
      removed.push(filePath);
      log.info(`Stopped tracking ${path.basename(filePath)} (file removed)`);
    }

    return { added, removed };
  }

  private async prime(state: FileTrackingState): Promise<boolean> {
    try {
      const primed = await primeFileState(state);
      if (!primed) {
        log.debug(`Cannot position ${state.origin} yet, retrying next cycle`);
      }
      return primed;
    } catch (err) {
      log.error(`Failed to open ${state.path}: ${String(err)}`);
      return false;
    }
  }

  /**
   * Reads one tracked file. Errors other than transient filesystem races are
   * logged and give no data, so one bad file does not stall the others.
   */
  async readFile(state: FileTrackingState): Promise<Measurement[]> {
    try {
      return await readNewMeasurements(state);
    } catch (err) {
      log.error(`Failed to read ${state.path}: ${String(err)}`);
      return [];
    }
  }

  /**
   * Runs one poll cycle and collects its measurements in per-file row order.
   */
  async pollOnce(): Promise<Measurement[]> {
    await this.syncFiles();
    const measurements: Measurement[] = [];
    for (const state of this.tracked.values()) {
      measurements.push(...(await this.readFile(state)));
    }
    return measurements;
  }

  /**
   * Polls until stopped, yielding measurements as each file is read.
   * A stop request is honoured only between files, so a file's rows are never cut short.
   */
  async *watch(options: WatchOptions = {}): AsyncGenerator<Measurement, void, undefined> {
    const waker = options.waker ?? new PollWaker();
    const stopRequested = () => options.signal?.aborted === true || options.shouldStop?.() === true;
    let cycle = 0;

    while (!stopRequested()) {
      cycle += 1;
      await this.syncFiles();

      for (const state of Array.from(this.tracked.values())) {
        if (stopRequested()) {
          return;
        }
        const measurements = await this.readFile(state);
        for (const measurement of measurements) {
          yield measurement;
        }
      }

      options.onCycleComplete?.(cycle);
      if (stopRequested()) {
        return;
      }
      await waker.sleep(this.pollIntervalMs, options.signal);
    }
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}
