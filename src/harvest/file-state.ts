import path from "node:path";
import type { FileTrackingState } from "./types.js";

export const EXPORT_FILE_EXTENSION = ".csv";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * True for `<prefix>*.csv` base names.
 */
export function isExportFileName(fileName: string, prefix: string): boolean {
  return fileName.startsWith(prefix) && fileName.toLowerCase().endsWith(EXPORT_FILE_EXTENSION);
}

/**
 * Instrument id from a file name such as `AutoExportTrace_iso 2024-05-01.csv` (gives `iso`).
 */
export function deriveSource(fileName: string, prefix: string): string {
  const base = path.basename(fileName);
  const match = new RegExp(`${escapeRegExp(prefix)}(\\S+)\\s`, "i").exec(base);
  if (match?.[1]) {
    return match[1];
  }
  const at = base.indexOf(prefix);
  if (at === -1) {
    return base;
  }
  const after = base.slice(at + prefix.length);
  const space = after.indexOf(" ");
  return space === -1 ? after : after.slice(0, space);
}

export function createFileTrackingState(filePath: string, prefix: string): FileTrackingState {
  const origin = path.basename(filePath);
  return {
    path: filePath,
    origin,
    source: deriveSource(origin, prefix),
    headerKnown: false,
    channelBindings: [],
    cursor: 0,
    pendingTail: Buffer.alloc(0),
    fileId: null,
  };
}

/**
 * Back to Discovering at byte 0. Used after truncation or replacement.
 */
export function resetFileTrackingState(state: FileTrackingState): void {
  state.headerKnown = false;
  state.channelBindings = [];
  state.cursor = 0;
  state.pendingTail = Buffer.alloc(0);
}

/**
 * Offset of the first byte not read yet.
 */
export function readOffset(state: FileTrackingState): number {
  return state.cursor + state.pendingTail.length;
}
