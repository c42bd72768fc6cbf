import fs, { type FileHandle } from "node:fs/promises";
import type { FileTrackingState, Measurement } from "./types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { extractMeasurements } from "./extractor.js";
import { readOffset, resetFileTrackingState } from "./file-state.js";
import { isTransientFsError } from "./fs-errors.js";
import { detectHeader } from "./headers/index.js";
import { decodeLine, splitCells, splitCompleteLines } from "./lines.js";

const log = createSubsystemLogger("harvest/tail-reader");

const PRIME_CHUNK_BYTES = 64 * 1024;

type DataRowHandler = (cells: string[]) => void;

/**
 * Stats the file, or returns null when it is gone or unreadable right now.
 */
async function statFile(filePath: string): Promise<{ size: number; fileId: number } | null> {
  try {
    const stat = await fs.stat(filePath);
    return { size: stat.size, fileId: stat.ino };
  } catch (err) {
    if (isTransientFsError(err)) {
      return null;
    }
    throw err;
  }
}

/**
 * Reads `[start, end)` in one pass. Returns null if the file vanished in between.
 * May return fewer bytes than asked for if the file shrank after the stat.
 */
async function readRange(filePath: string, start: number, end: number): Promise<Buffer | null> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, "r");
  } catch (err) {
    if (isTransientFsError(err)) {
      return null;
    }
    throw err;
  }
  try {
    const length = Math.max(0, end - start);
    const buffer = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const { bytesRead } = await handle.read(buffer, filled, length - filled, start + filled);
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
    }
    return buffer.subarray(0, filled);
  } catch (err) {
    if (isTransientFsError(err)) {
      return null;
    }
    throw err;
  } finally {
    await handle.close();
  }
}

/**
 * Feeds every complete line of `data` through header detection or the data handler.
 *
 * `data` must start at `state.cursor`. The cursor moves past each complete line,
 * and the unterminated remainder becomes `state.pendingTail`. The header line is
 * consumed and never treated as data. With a null handler, lines after the header
 * are only counted.
 */
export function consumeLines(
  state: FileTrackingState,
  data: Buffer,
  onDataRow: DataRowHandler | null,
): void {
  const { lines, rest } = splitCompleteLines(data);

  for (const line of lines) {
    state.cursor += line.byteLength;
    if (state.headerKnown && !onDataRow) {
      continue;
    }

    const text = decodeLine(line.content);
    if (text === null) {
      continue;
    }
    const cells = splitCells(text);
    if (!cells) {
      continue;
    }

    if (!state.headerKnown) {
      const header = detectHeader(cells);
      if (header) {
        state.headerKnown = true;
        state.channelBindings = header.bindings;
        log.debug(`Header found in ${state.origin}`, {
          format: header.kind,
          channels: header.bindings.length,
          cursor: state.cursor,
        });
      }
      continue;
    }

    onDataRow?.(cells);
  }

  state.pendingTail = rest;
}

/**
 * Resets the state if the file shrank below what has been read or was replaced.
 */
function detectTruncation(state: FileTrackingState, stat: { size: number; fileId: number }): void {
  const replaced = state.fileId !== null && state.fileId !== stat.fileId;
  const shrunk = stat.size < readOffset(state);
  if (replaced || shrunk) {
    log.info(`${replaced ? "Replacement" : "Truncation"} detected for ${state.path}, rediscovering header`, {
      size: stat.size,
      cursor: state.cursor,
    });
    resetFileTrackingState(state);
  }
  state.fileId = stat.fileId;
}

/**
 * Positions a newly tracked file at its current end without emitting anything.
 * Existing complete lines are scanned so a header already written is bound.
 * The cursor ends at the last complete line, so a row still being written is
 * picked up once its line break arrives.
 *
 * Returns false when the file is gone or busy; the state is then left at byte 0
 * and the caller should try again later.
 */
export async function primeFileState(state: FileTrackingState): Promise<boolean> {
  const stat = await statFile(state.path);
  if (!stat) {
    return false;
  }

  resetFileTrackingState(state);
  for (let offset = 0; offset < stat.size; offset = readOffset(state)) {
    const chunk = await readRange(state.path, offset, Math.min(stat.size, offset + PRIME_CHUNK_BYTES));
    if (!chunk) {
      resetFileTrackingState(state);
      return false;
    }
    if (chunk.length === 0) {
      break;
    }
    consumeLines(state, Buffer.concat([state.pendingTail, chunk]), null);
  }
  state.pendingTail = Buffer.alloc(0);
  state.fileId = stat.fileId;

  log.debug(`Primed ${state.origin} at end of file`, {
    cursor: state.cursor,
    headerKnown: state.headerKnown,
  });
  return true;
}

/**
 * Returns the measurements appended to the file since the previous call.
 *
 * A missing or unreadable file yields nothing and leaves the state alone.
 * A shrunk or replaced file is read again from byte 0.
 */
export async function readNewMeasurements(state: FileTrackingState): Promise<Measurement[]> {
  const stat = await statFile(state.path);
  if (!stat) {
    return [];
  }

  detectTruncation(state, stat);

  const start = readOffset(state);
  if (stat.size <= start) {
    return [];
  }

  const chunk = await readRange(state.path, start, stat.size);
  if (!chunk || chunk.length === 0) {
    return [];
  }

  const measurements: Measurement[] = [];
  consumeLines(state, Buffer.concat([state.pendingTail, chunk]), (cells) => {
    measurements.push(...extractMeasurements(cells, state.channelBindings, state));
  });

  return measurements;
}
