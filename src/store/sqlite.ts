import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { DURABILITY_PRESETS, type DurabilityMode } from "../config/durability.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("store/sqlite");

export const IN_MEMORY_DB = ":memory:";

/**
 * Opens the sample database and applies the journal and sync settings of `mode`.
 */
export function openSampleDatabase(dbPath: string, mode: DurabilityMode = "safe"): SqliteDatabase {
  if (dbPath !== IN_MEMORY_DB) {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  const preset = DURABILITY_PRESETS[mode];
  try {
    db.pragma(`journal_mode = ${preset.journalMode}`);
    db.pragma(`synchronous = ${preset.synchronous}`);
  } catch (err) {
    db.close();
    throw err;
  }

  if (mode === "aggressive") {
    log.warn("Aggressive durability: a crash can lose the most recent batches", { dbPath });
  }
  return db;
}
