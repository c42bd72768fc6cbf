import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Measurement } from "./types.js";
import { FileSetManager } from "./file-set.js";
import { deriveSource, isExportFileName } from "./file-state.js";
import { EXPORT_PREFIX, appendText, makeTempDir, removeDir, writeText } from "./test-helpers.js";

const HEADER = "Scan Sweep Time (Sec),Scan Number,V1\n";

function fsError(code: string): Error {
  return Object.assign(new Error(`${code}: simulated failure`), { code });
}

describe("file-set", () => {
  describe("deriveSource", () => {
    it("takes the text between the prefix and the next whitespace", () => {
      expect(deriveSource("AutoExportTrace_iso 2024-05-01 10-00-00.csv", EXPORT_PREFIX)).toBe("iso");
      expect(deriveSource("AutoExportTrace_40\t(2).csv", EXPORT_PREFIX)).toBe("40");
    });

    it("matches the prefix case-insensitively", () => {
      expect(deriveSource("autoexporttrace_Iso run.csv", EXPORT_PREFIX)).toBe("Iso");
    });

    it("falls back to everything after the prefix up to the first space", () => {
      expect(deriveSource("AutoExportTrace_iso.csv", EXPORT_PREFIX)).toBe("iso.csv");
      expect(deriveSource("/data/AutoExportTrace_40.csv", EXPORT_PREFIX)).toBe("40.csv");
    });

    it("uses the base name when the prefix is absent", () => {
      expect(deriveSource("other.csv", EXPORT_PREFIX)).toBe("other.csv");
    });
  });

  describe("isExportFileName", () => {
    it("requires the prefix and a csv extension", () => {
      expect(isExportFileName("AutoExportTrace_iso run.csv", EXPORT_PREFIX)).toBe(true);
      expect(isExportFileName("AutoExportTrace_iso.CSV", EXPORT_PREFIX)).toBe(true);
      expect(isExportFileName("AutoExportTrace_iso.txt", EXPORT_PREFIX)).toBe(false);
      expect(isExportFileName("copy of AutoExportTrace_iso.csv", EXPORT_PREFIX)).toBe(false);
    });
  });

  describe("FileSetManager", () => {
    let dir: string;

    beforeEach(() => {
      dir = makeTempDir();
    });

    afterEach(() => {
      vi.restoreAllMocks();
      removeDir(dir);
    });

    const manager = (backfill: boolean) =>
      new FileSetManager({ directory: dir, backfill, pollIntervalMs: 5 });

    it("lists only export files", async () => {
      writeText(path.join(dir, "AutoExportTrace_b run.csv"), "");
      writeText(path.join(dir, "AutoExportTrace_a run.csv"), "");
      writeText(path.join(dir, "notes.csv"), "");
      fs.mkdirSync(path.join(dir, "AutoExportTrace_dir.csv"));

      expect(await manager(false).listExportFiles()).toEqual([
        path.join(dir, "AutoExportTrace_a run.csv"),
        path.join(dir, "AutoExportTrace_b run.csv"),
      ]);
    });

    it("follows symbolic links that resolve to files", async () => {
      const target = path.join(dir, "instrument.data");
      writeText(target, "");
      writeText(path.join(dir, "AutoExportTrace_a run.csv"), "");
      fs.symlinkSync(target, path.join(dir, "AutoExportTrace_link run.csv"));
      fs.symlinkSync(path.join(dir, "gone.data"), path.join(dir, "AutoExportTrace_gone run.csv"));

      expect(await manager(false).listExportFiles()).toEqual([
        path.join(dir, "AutoExportTrace_a run.csv"),
        path.join(dir, "AutoExportTrace_link run.csv"),
      ]);
    });

    it("treats a missing directory as empty", async () => {
      const files = new FileSetManager({ directory: path.join(dir, "missing"), pollIntervalMs: 5 });
      expect(await files.listExportFiles()).toEqual([]);
      expect(await files.pollOnce()).toEqual([]);
    });

    it("reads existing content when backfilling", async () => {
      writeText(path.join(dir, "AutoExportTrace_iso run.csv"), `${HEADER}0.0,1,1.5\n`);

      const measurements = await manager(true).pollOnce();

      expect(measurements).toEqual([
        {
          timestamp: "0.0",
          source: "iso",
          channel: "V1",
          value: 1.5,
          origin: "AutoExportTrace_iso run.csv",
        },
      ]);
    });

    it("starts at the end of existing files without backfill", async () => {
      const file = path.join(dir, "AutoExportTrace_iso run.csv");
      writeText(file, `${HEADER}0.0,1,1.5\n`);
      const files = manager(false);

      expect(await files.pollOnce()).toEqual([]);
      expect(files.getState(file)?.headerKnown).toBe(true);

      appendText(file, "1.0,2,2.5\n");
      expect((await files.pollOnce()).map((m) => m.value)).toEqual([2.5]);
    });

    it("positions files discovered later at their end as well", async () => {
      const files = manager(false);
      expect(await files.pollOnce()).toEqual([]);

      writeText(path.join(dir, "AutoExportTrace_40 run.csv"), `${HEADER}0.0,1,7\n`);
      const { added } = await files.syncFiles();
      expect(added).toEqual([path.join(dir, "AutoExportTrace_40 run.csv")]);

      // Primed at its end when first seen, so the row already there is not emitted
      expect(await files.pollOnce()).toEqual([]);
    });

    it("retries positioning a busy file instead of reading it from the start", async () => {
      const file = path.join(dir, "AutoExportTrace_iso run.csv");
      writeText(file, `${HEADER}0.0,1,1.5\n1.0,2,2.5\n`);
      const files = manager(false);
      vi.spyOn(fsp, "open").mockRejectedValueOnce(fsError("EBUSY"));

      expect(await files.pollOnce()).toEqual([]);
      expect(files.trackedCount).toBe(0);

      expect(await files.pollOnce()).toEqual([]);
      expect(files.trackedPaths()).toEqual([file]);

      appendText(file, "2.0,3,3.5\n");
      expect((await files.pollOnce()).map((m) => m.value)).toEqual([3.5]);
    });

    it("keeps tracking the other files when one fails to open", async () => {
      const broken = path.join(dir, "AutoExportTrace_a run.csv");
      const healthy = path.join(dir, "AutoExportTrace_b run.csv");
      writeText(broken, `${HEADER}0,1,1\n`);
      writeText(healthy, `${HEADER}0,1,10\n`);
      const files = manager(false);
      vi.spyOn(fsp, "open").mockRejectedValueOnce(fsError("EIO"));

      expect(await files.pollOnce()).toEqual([]);
      expect(files.trackedPaths()).toEqual([healthy]);

      appendText(healthy, "1,2,20\n");
      expect((await files.pollOnce()).map((m) => [m.source, m.value])).toEqual([["b", 20]]);
      expect(files.trackedPaths()).toEqual([healthy, broken]);
    });

    it("drops state for files that disappear", async () => {
      const file = path.join(dir, "AutoExportTrace_iso run.csv");
      writeText(file, HEADER);
      const files = manager(true);
      await files.syncFiles();
      expect(files.trackedPaths()).toEqual([file]);

      fs.unlinkSync(file);
      const { removed } = await files.syncFiles();

      expect(removed).toEqual([file]);
      expect(files.trackedCount).toBe(0);
    });

    it("keeps per-file row order across several files", async () => {
      writeText(path.join(dir, "AutoExportTrace_a run.csv"), `${HEADER}0,1,1\n1,2,2\n`);
      writeText(path.join(dir, "AutoExportTrace_b run.csv"), `${HEADER}0,1,10\n1,2,20\n`);

      const measurements = await manager(true).pollOnce();
      const bySource = (source: string) =>
        measurements.filter((m) => m.source === source).map((m) => m.value);

      expect(bySource("a")).toEqual([1, 2]);
      expect(bySource("b")).toEqual([10, 20]);
    });

    describe("watch", () => {
      it("polls until asked to stop and reports each cycle", async () => {
        const file = path.join(dir, "AutoExportTrace_iso run.csv");
        writeText(file, `${HEADER}0,1,1\n`);
        const files = manager(true);
        const cycles: number[] = [];
        const seen: Measurement[] = [];

        for await (const measurement of files.watch({
          shouldStop: () => cycles.length >= 2,
          onCycleComplete: (cycle) => {
            cycles.push(cycle);
            if (cycle === 1) {
              appendText(file, "1,2,2\n");
            }
          },
        })) {
          seen.push(measurement);
        }

        expect(cycles).toEqual([1, 2]);
        expect(seen.map((m) => m.value)).toEqual([1, 2]);
      });

      it("yields nothing when already aborted", async () => {
        writeText(path.join(dir, "AutoExportTrace_iso run.csv"), `${HEADER}0,1,1\n`);
        const abort = new AbortController();
        abort.abort();
        const seen: Measurement[] = [];

        for await (const measurement of manager(true).watch({ signal: abort.signal })) {
          seen.push(measurement);
        }

        expect(seen).toEqual([]);
      });

      it("finishes the current file before stopping", async () => {
        writeText(path.join(dir, "AutoExportTrace_a run.csv"), `${HEADER}0,1,1\n1,2,2\n`);
        writeText(path.join(dir, "AutoExportTrace_b run.csv"), `${HEADER}0,1,10\n`);
        let stop = false;
        const seen: Measurement[] = [];

        for await (const measurement of manager(true).watch({ shouldStop: () => stop })) {
          seen.push(measurement);
          stop = true;
        }

        expect(seen.map((m) => [m.source, m.value])).toEqual([
          ["a", 1],
          ["a", 2],
        ]);
      });
    });
  });
});
