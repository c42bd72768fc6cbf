import { describe, expect, it } from "vitest";
import { HEADER_FORMATS, bindChannels, detectHeader, isRowMarkerLabel, type HeaderFormat } from "./index.js";

describe("headers", () => {
  describe("detectHeader", () => {
    it("recognizes the leader header and binds channels from column 2", () => {
      const match = detectHeader([
        "Scan Sweep Time (Sec)",
        "Scan Number",
        "116 (Vdc)- EGSE7V",
        "117 (Vdc)- EGSE12V",
      ]);

      expect(match).toEqual({
        kind: "leader",
        bindings: [
          { name: "116 (Vdc)- EGSE7V", column: 2 },
          { name: "117 (Vdc)- EGSE12V", column: 3 },
        ],
      });
    });

    it("recognizes a row-marker header written without a space", () => {
      const match = detectHeader(["T", "ScanNumber", "ChA", "ChB"]);

      expect(match?.kind).toBe("row-marker");
      expect(match?.bindings).toEqual([
        { name: "ChA", column: 2 },
        { name: "ChB", column: 3 },
      ]);
    });

    it("matches the row-marker label case-insensitively and trims names", () => {
      const match = detectHeader(["Time", "  scan number ", "  Ch1  "]);

      expect(match).toEqual({ kind: "row-marker", bindings: [{ name: "Ch1", column: 2 }] });
    });

    it("prefers the leader format when both formats match", () => {
      const match = detectHeader(["Scan Sweep Time (Sec)", "Scan Number", "V1"]);
      expect(match?.kind).toBe("leader");
    });

    it("skips blank header cells and keeps absolute column indexes", () => {
      const match = detectHeader(["Scan Sweep Time (Sec)", "Scan Number", "A", "", "  ", "B"]);

      expect(match?.bindings).toEqual([
        { name: "A", column: 2 },
        { name: "B", column: 5 },
      ]);
    });

    it("accepts a header without channels", () => {
      expect(detectHeader(["T", "Scan Number"])).toEqual({ kind: "row-marker", bindings: [] });
    });

    it("returns null for data and banner rows", () => {
      expect(detectHeader(["2024-01-01T00:00:00", "1", "3.5"])).toBeNull();
      expect(detectHeader(["Keysight BenchVue export"])).toBeNull();
      expect(detectHeader(["Scan Number"])).toBeNull();
      expect(detectHeader([])).toBeNull();
    });

    it("tries only the formats it is given", () => {
      const onlyLeader: HeaderFormat[] = HEADER_FORMATS.filter((format) => format.kind === "leader");
      expect(detectHeader(["T", "Scan Number", "A"], onlyLeader)).toBeNull();
    });
  });

  describe("bindChannels", () => {
    it("starts at the given column", () => {
      expect(bindChannels(["a", "b", "c", "d"], 3)).toEqual([{ name: "d", column: 3 }]);
    });
  });

  describe("isRowMarkerLabel", () => {
    it("ignores whitespace and case", () => {
      expect(isRowMarkerLabel("SCAN NUMBER")).toBe(true);
      expect(isRowMarkerLabel("Scan\tNumber")).toBe(true);
      expect(isRowMarkerLabel("Scan Count")).toBe(false);
    });
  });
});
