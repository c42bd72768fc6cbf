import os from "node:os";
import path from "node:path";

export const DEFAULT_DB_FILENAME = "samples.sqlite3";

/**
 * Expands a leading `~` and resolves the result against `cwd`.
 */
export function resolveUserPath(input: string, cwd: string = process.cwd()): string {
  const trimmed = input.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/") || trimmed.startsWith("~\\")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return path.resolve(cwd, trimmed);
}

export function resolveDefaultDbPath(cwd: string = process.cwd()): string {
  return path.join(cwd, DEFAULT_DB_FILENAME);
}
