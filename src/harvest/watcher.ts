import chokidar, { type FSWatcher } from "chokidar";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { isExportFileName } from "./file-state.js";

const log = createSubsystemLogger("harvest/watcher");

/**
 * Event emitted when an export file changes.
 */
export type FileChangeEvent = {
  path: string;
  eventType: "add" | "change" | "unlink";
};

/**
 * Callback for file change events.
 */
export type FileChangeCallback = (event: FileChangeEvent) => void;

/**
 * Watches `directory` (not recursive) for export files named `<filePrefix>*.csv`.
 * Writes are reported as they happen; the poll loop reads whatever complete lines exist.
 */
export function createExportFileWatcher(
  directory: string,
  filePrefix: string,
  onFileChange: FileChangeCallback,
): FSWatcher {
  const watcher = chokidar.watch(directory, {
    ignoreInitial: true,
    depth: 0,
    // Ignore hidden files (editor swap files, sync markers)
    ignored: (filePath: string) => filePath !== directory && path.basename(filePath).startsWith("."),
  });

  const emitEvent = (eventType: FileChangeEvent["eventType"], filePath: string) => {
    if (!isExportFileName(path.basename(filePath), filePrefix)) {
      return;
    }
    log.debug(`File ${eventType}: ${filePath}`);
    onFileChange({ path: filePath, eventType });
  };

  watcher.on("add", (filePath) => emitEvent("add", filePath));
  watcher.on("change", (filePath) => emitEvent("change", filePath));
  watcher.on("unlink", (filePath) => emitEvent("unlink", filePath));
  watcher.on("error", (error) => {
    log.error(`Watcher error: ${String(error)}`);
  });

  return watcher;
}
