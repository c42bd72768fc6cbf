/**
 * Instrument export harvesting.
 *
 * Polls a directory for `AutoExportTrace_*.csv` files, follows each file as it
 * grows and stores every measurement once in SQLite.
 *
 * @example
 * ```ts
 * import { Harvester, loadHarvestConfig } from "trace-harvester";
 *
 * const harvester = new Harvester(loadHarvestConfig({ directory: "./exports", backfill: true }));
 * process.once("SIGINT", () => harvester.stop());
 *
 * const summary = await harvester.run();
 * console.log(`Stored ${summary.written} of ${summary.attempted} measurements`);
 * ```
 */

// Composition root
export {
  Harvester,
  type HarvestStatus,
  type HarvestSummary,
  type HarvesterHooks,
} from "./harvester.js";

// Persistence
export { BatchIngester, type BatchIngesterOptions, type IngestStats } from "./ingestor.js";
export {
  countSamples,
  ensureIdentityIndex,
  ensureSamplesSchema,
  prepareSampleInsert,
  type InsertStrategy,
  type SampleInsert,
} from "./schema.js";

// File tracking
export { FileSetManager, type FileSetOptions, type WatchOptions } from "./file-set.js";
export {
  createFileTrackingState,
  deriveSource,
  isExportFileName,
  resetFileTrackingState,
} from "./file-state.js";
export { consumeLines, primeFileState, readNewMeasurements } from "./tail-reader.js";
export { PollWaker } from "./waker.js";
export {
  createExportFileWatcher,
  type FileChangeCallback,
  type FileChangeEvent,
} from "./watcher.js";

// Rows and headers
export { extractMeasurements, isDataRow, parseChannelValue } from "./extractor.js";
export {
  HEADER_FORMATS,
  HEADER_LEADER,
  ROW_MARKER_LABEL,
  bindChannels,
  detectHeader,
  type HeaderFormat,
  type HeaderFormatKind,
  type HeaderMatch,
} from "./headers/index.js";
export { decodeLine, splitCells, splitCompleteLines } from "./lines.js";

export type { ChannelBinding, FileTrackingState, Measurement } from "./types.js";
