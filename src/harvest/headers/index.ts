import type { ChannelBinding } from "../types.js";
import { leaderHeaderFormat } from "./leader.js";
import { rowMarkerHeaderFormat } from "./row-marker.js";

export { HEADER_LEADER, leaderHeaderFormat } from "./leader.js";
export { ROW_MARKER_LABEL, isRowMarkerLabel, rowMarkerHeaderFormat } from "./row-marker.js";

/**
 * Header layouts seen across instrument export variants.
 */
export type HeaderFormatKind = "leader" | "row-marker";

export type HeaderFormat = {
  kind: HeaderFormatKind;
  /** First column that can carry a channel name */
  firstChannelColumn: number;
  matches: (cells: string[]) => boolean;
};

export type HeaderMatch = {
  kind: HeaderFormatKind;
  bindings: ChannelBinding[];
};

/**
 * Formats in the order they are tried. The leader format is stricter, so it goes first.
 */
export const HEADER_FORMATS: readonly HeaderFormat[] = [leaderHeaderFormat, rowMarkerHeaderFormat];

/**
 * Binds every non-blank cell from `firstColumn` on to its absolute column index.
 */
export function bindChannels(cells: string[], firstColumn: number): ChannelBinding[] {
  const bindings: ChannelBinding[] = [];
  for (let column = firstColumn; column < cells.length; column += 1) {
    const name = (cells[column] ?? "").trim();
    if (!name) {
      continue;
    }
    bindings.push({ name, column });
  }
  return bindings;
}

/**
 * Returns the channel bindings if `cells` is a header row in any known format.
 */
export function detectHeader(
  cells: string[],
  formats: readonly HeaderFormat[] = HEADER_FORMATS,
): HeaderMatch | null {
  for (const format of formats) {
    if (format.matches(cells)) {
      return {
        kind: format.kind,
        bindings: bindChannels(cells, format.firstChannelColumn),
      };
    }
  }
  return null;
}
