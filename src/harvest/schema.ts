import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import type { Measurement } from "./types.js";

/**
 * How duplicate measurements are kept out of `samples`.
 * - `constraint`: unique index plus `ON CONFLICT DO NOTHING`
 * - `conditional`: `INSERT … SELECT … WHERE NOT EXISTS` when the index cannot be built
 */
export type InsertStrategy = "constraint" | "conditional";

export type SampleInsert = (measurement: Measurement) => boolean;

/**
 * Ensures the samples table and its lookup indexes exist.
 */
export function ensureSamplesSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS samples (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT NOT NULL,
      source TEXT NOT NULL,
      channel TEXT NOT NULL,
      value REAL,
      origin TEXT
    );
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_samples_timestamp ON samples(timestamp);`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_samples_source ON samples(source);`);
}

function isConstraintError(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code.startsWith("SQLITE_CONSTRAINT");
}

/**
 * Creates the unique index over (timestamp, source, channel).
 * Tables that already hold duplicates cannot take it and get conditional inserts instead.
 */
export function ensureIdentityIndex(db: SqliteDatabase): InsertStrategy {
  try {
    db.exec(
      `CREATE UNIQUE INDEX IF NOT EXISTS ux_samples_identity ON samples(timestamp, source, channel);`,
    );
    return "constraint";
  } catch (err) {
    if (isConstraintError(err)) {
      return "conditional";
    }
    throw err;
  }
}

/**
 * Prepares the duplicate-safe insert. The returned function reports whether a row was written.
 */
export function prepareSampleInsert(db: SqliteDatabase, strategy: InsertStrategy): SampleInsert {
  if (strategy === "constraint") {
    const stmt = db.prepare<[string, string, string, number, string]>(
      `INSERT INTO samples (timestamp, source, channel, value, origin)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(timestamp, source, channel) DO NOTHING`,
    );
    return (m) => stmt.run(m.timestamp, m.source, m.channel, m.value, m.origin).changes === 1;
  }

  const stmt = db.prepare<[string, string, string, number, string, string, string, string]>(
    `INSERT INTO samples (timestamp, source, channel, value, origin)
     SELECT ?, ?, ?, ?, ?
     WHERE NOT EXISTS (
       SELECT 1 FROM samples WHERE timestamp = ? AND source = ? AND channel = ?
     )`,
  );
  return (m) =>
    stmt.run(m.timestamp, m.source, m.channel, m.value, m.origin, m.timestamp, m.source, m.channel)
      .changes === 1;
}

function readCount(row: unknown): number {
  if (row && typeof row === "object" && "count" in row && typeof row.count === "number") {
    return row.count;
  }
  return 0;
}

/**
 * Counts stored samples, optionally for one source.
 */
export function countSamples(db: SqliteDatabase, source?: string): number {
  if (source === undefined) {
    return readCount(db.prepare("SELECT COUNT(*) AS count FROM samples").get());
  }
  return readCount(db.prepare("SELECT COUNT(*) AS count FROM samples WHERE source = ?").get(source));
}
