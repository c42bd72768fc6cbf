import type { Database as SqliteDatabase } from "better-sqlite3";
import type { BatchPolicy } from "../config/durability.js";
import type { Measurement } from "./types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  ensureIdentityIndex,
  ensureSamplesSchema,
  prepareSampleInsert,
  type InsertStrategy,
  type SampleInsert,
} from "./schema.js";

const log = createSubsystemLogger("harvest/ingestor");

/**
 * Options for the batch ingester.
 */
export type BatchIngesterOptions = BatchPolicy & {
  /** Clock in milliseconds, replaceable in tests */
  now?: () => number;
};

export type IngestStats = {
  /** Rows handed to the store */
  attempted: number;
  /** Rows actually written; excludes duplicates and rolled-back rows */
  written: number;
  /** Rows in the open, uncommitted transaction */
  pending: number;
  /** Commits performed */
  flushes: number;
  strategy: InsertStrategy;
};

/**
 * Writes measurements with a duplicate-safe insert and commits every
 * `batchRows` rows or `batchSeconds` seconds, whichever comes first.
 */
export class BatchIngester {
  readonly strategy: InsertStrategy;
  private readonly db: SqliteDatabase;
  private readonly insert: SampleInsert;
  private readonly batchRows: number;
  private readonly batchMs: number;
  private readonly now: () => number;
  private attempted = 0;
  private written = 0;
  private pending = 0;
  private pendingWritten = 0;
  private flushes = 0;
  private lastFlushAt: number;
  private closed = false;

  constructor(db: SqliteDatabase, options: BatchIngesterOptions) {
    this.db = db;
    this.batchRows = Math.max(1, Math.floor(options.batchRows));
    this.batchMs = Math.max(0, options.batchSeconds * 1000);
    this.now = options.now ?? Date.now;

    ensureSamplesSchema(db);
    this.strategy = ensureIdentityIndex(db);
    if (this.strategy === "conditional") {
      log.warn("Existing duplicate samples block the unique index; using conditional inserts");
    }
    this.insert = prepareSampleInsert(db, this.strategy);
    this.lastFlushAt = this.now();
  }

  /**
   * Writes one measurement. Returns false when it was already stored.
   * A store error rolls back the open batch and is rethrown.
   */
  ingest(measurement: Measurement): boolean {
    if (this.closed) {
      throw new Error("Ingester is closed");
    }
    if (!this.db.inTransaction) {
      this.db.exec("BEGIN");
    }

    let inserted: boolean;
    try {
      inserted = this.insert(measurement);
    } catch (err) {
      this.rollback();
      throw err;
    }

    this.attempted += 1;
    this.pending += 1;
    if (inserted) {
      this.written += 1;
      this.pendingWritten += 1;
    }

    this.maybeFlush();
    return inserted;
  }

  /**
   * Commits if either batch threshold has been reached. Returns whether it committed.
   */
  maybeFlush(): boolean {
    if (this.pending === 0) {
      return false;
    }
    const elapsed = this.now() - this.lastFlushAt;
    if (this.pending >= this.batchRows || elapsed >= this.batchMs) {
      this.flush();
      return true;
    }
    return false;
  }

  /**
   * Commits the open batch, if any.
   */
  flush(): void {
    if (this.db.inTransaction) {
      try {
        this.db.exec("COMMIT");
      } catch (err) {
        this.rollback();
        throw err;
      }
    }
    if (this.pending > 0) {
      this.flushes += 1;
      log.debug("Committed batch", { rows: this.pending, written: this.pendingWritten });
    }
    this.pending = 0;
    this.pendingWritten = 0;
    this.lastFlushAt = this.now();
  }

  stats(): IngestStats {
    return {
      attempted: this.attempted,
      written: this.written,
      pending: this.pending,
      flushes: this.flushes,
      strategy: this.strategy,
    };
  }

  /**
   * Final flush. The database itself stays open; its owner closes it.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.flush();
    this.closed = true;
  }

  private rollback(): void {
    if (this.db.inTransaction) {
      this.db.exec("ROLLBACK");
    }
    this.written -= this.pendingWritten;
    this.pending = 0;
    this.pendingWritten = 0;
  }
}
