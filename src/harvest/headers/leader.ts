import type { HeaderFormat } from "./index.js";

export const HEADER_LEADER = "Scan Sweep Time (Sec)";

/**
 * `Scan Sweep Time (Sec),Scan Number,<channel>,<channel>,...`
 */
export const leaderHeaderFormat: HeaderFormat = {
  kind: "leader",
  firstChannelColumn: 2,
  matches: (cells) => cells.length > 0 && (cells[0] ?? "").trim() === HEADER_LEADER,
};
