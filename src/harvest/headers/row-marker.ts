import type { HeaderFormat } from "./index.js";

export const ROW_MARKER_LABEL = "Scan Number";

function normalizeLabel(value: string): string {
  return value.replace(/\s+/g, "").toLowerCase();
}

const NORMALIZED_ROW_MARKER = normalizeLabel(ROW_MARKER_LABEL);

/**
 * Matches `Scan Number`, `scan number` and `ScanNumber`.
 */
export function isRowMarkerLabel(cell: string): boolean {
  return normalizeLabel(cell) === NORMALIZED_ROW_MARKER;
}

/**
 * Any first column, the row-marker label in column 1, channels after it.
 */
export const rowMarkerHeaderFormat: HeaderFormat = {
  kind: "row-marker",
  firstChannelColumn: 2,
  matches: (cells) => cells.length > 1 && isRowMarkerLabel(cells[1] ?? ""),
};
