import { parse } from "csv-parse/sync";
import { TextDecoder } from "node:util";

const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

// Strict so a corrupt line is reported instead of silently patched with U+FFFD.
// A leading byte-order mark is dropped by the decoder.
const utf8 = new TextDecoder("utf-8", { fatal: true });

export type CompleteLine = {
  /** Line bytes without the `\n` and without a trailing `\r` */
  content: Buffer;
  /** Bytes the line occupies in the file, terminator included */
  byteLength: number;
};

/**
 * Splits `data` into `\n`-terminated lines. Bytes after the last `\n` are returned as `rest`.
 */
export function splitCompleteLines(data: Buffer): { lines: CompleteLine[]; rest: Buffer } {
  const lines: CompleteLine[] = [];
  let start = 0;
  let newline = data.indexOf(LINE_FEED, start);
  while (newline !== -1) {
    let end = newline;
    if (end > start && data[end - 1] === CARRIAGE_RETURN) {
      end -= 1;
    }
    lines.push({ content: data.subarray(start, end), byteLength: newline + 1 - start });
    start = newline + 1;
    newline = data.indexOf(LINE_FEED, start);
  }
  return { lines, rest: Buffer.from(data.subarray(start)) };
}

/**
 * Decodes one line as UTF-8. Returns null for bytes that are not valid UTF-8.
 */
export function decodeLine(content: Buffer): string | null {
  try {
    return utf8.decode(content);
  } catch {
    return null;
  }
}

/**
 * Splits one CSV line into cells. Returns null for blank lines and lines the CSV parser rejects.
 */
export function splitCells(line: string): string[] | null {
  if (line.trim() === "") {
    return null;
  }
  let records: unknown;
  try {
    records = parse(line, {
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
    });
  } catch {
    return null;
  }
  if (!Array.isArray(records)) {
    return null;
  }
  const first: unknown = records[0];
  if (!Array.isArray(first)) {
    return null;
  }
  return first.map((cell: unknown) => (typeof cell === "string" ? cell : String(cell)));
}
