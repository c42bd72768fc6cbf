import type { ChannelBinding, Measurement } from "./types.js";

const ROW_MARKER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * A row is data only if its row-marker cell (column 1) is an integer.
 * Banner and metadata rows fail this test.
 */
export function isDataRow(cells: string[]): boolean {
  if (cells.length < 2) {
    return false;
  }
  return ROW_MARKER_PATTERN.test((cells[1] ?? "").trim());
}

/**
 * Parses a decimal cell. Blank, non-numeric and non-finite cells give null.
 */
export function parseChannelValue(cell: string): number | null {
  const trimmed = cell.trim();
  if (!trimmed || !DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Turns one data row into measurements for every bound channel that has a usable value.
 */
export function extractMeasurements(
  cells: string[],
  bindings: readonly ChannelBinding[],
  file: { source: string; origin: string },
): Measurement[] {
  if (!isDataRow(cells)) {
    return [];
  }
  const timestamp = (cells[0] ?? "").trim();
  const measurements: Measurement[] = [];
  for (const binding of bindings) {
    if (binding.column >= cells.length) {
      continue;
    }
    const value = parseChannelValue(cells[binding.column] ?? "");
    if (value === null) {
      continue;
    }
    measurements.push({
      timestamp,
      source: file.source,
      channel: binding.name,
      value,
      origin: file.origin,
    });
  }
  return measurements;
}
