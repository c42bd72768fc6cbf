import { Command, InvalidArgumentError } from "commander";
import type { Measurement } from "../harvest/types.js";
import {
  DEFAULT_POLL_INTERVAL_SECONDS,
  loadHarvestConfig,
  type HarvestConfigOverrides,
} from "../config/config.js";
import { durabilityModeSchema, type DurabilityMode } from "../config/durability.js";
import { FileSetManager } from "../harvest/file-set.js";
import { Harvester } from "../harvest/harvester.js";

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const defaultIo: CliIo = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export type IngestCliOptions = {
  dir?: string;
  db?: string;
  interval?: number;
  backfill?: boolean;
  mode?: DurabilityMode;
  batchRows?: number;
  batchSeconds?: number;
  progress?: boolean;
  wakeOnChange?: boolean;
  prefix?: string;
};

export type TailCliOptions = Pick<IngestCliOptions, "dir" | "interval" | "backfill" | "prefix">;

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = parsePositiveNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseMode(value: string): DurabilityMode {
  const parsed = durabilityModeSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${durabilityModeSchema.options.join(", ")}.`);
  }
  return parsed.data;
}

export function ingestOptionsToOverrides(options: IngestCliOptions): HarvestConfigOverrides {
  return {
    directory: options.dir,
    dbPath: options.db,
    pollIntervalSeconds: options.interval,
    backfill: options.backfill,
    mode: options.mode,
    batchRows: options.batchRows,
    batchSeconds: options.batchSeconds,
    progress: options.progress,
    wakeOnChange: options.wakeOnChange,
    filePrefix: options.prefix,
  };
}

export function formatMeasurement(measurement: Measurement): string {
  return [
    measurement.timestamp,
    measurement.source,
    measurement.channel,
    String(measurement.value),
    measurement.origin,
  ].join("\t");
}

/**
 * Routes SIGINT and SIGTERM to a cooperative stop. Returns a function that removes the handlers.
 */
export function onStopSignals(stop: () => void, io: CliIo): () => void {
  const handler = () => {
    io.err("Stopping after current batch...");
    stop();
  };
  process.on("SIGINT", handler);
  process.on("SIGTERM", handler);
  return () => {
    process.off("SIGINT", handler);
    process.off("SIGTERM", handler);
  };
}

async function runIngest(options: IngestCliOptions, io: CliIo): Promise<void> {
  const config = loadHarvestConfig(ingestOptionsToOverrides(options));

  io.out(`Watching: ${config.directory}`);
  io.out(`Database: ${config.dbPath}`);
  if (config.backfill) {
    io.out(`Backfill: enabled (processing existing file contents, ${config.mode} durability)`);
  }

  const harvester = new Harvester(config, {
    onProgress: (measurement, stats) => {
      io.out(`[${stats.written}/${stats.attempted}] ${formatMeasurement(measurement)}`);
    },
  });
  const removeSignals = onStopSignals(() => harvester.stop(), io);
  try {
    const summary = await harvester.run();
    io.out(`Inserted rows: ${summary.written} (attempted ${summary.attempted})`);
  } finally {
    removeSignals();
  }
}

async function runTail(options: TailCliOptions, io: CliIo): Promise<void> {
  const config = loadHarvestConfig({
    directory: options.dir,
    pollIntervalSeconds: options.interval,
    backfill: options.backfill,
    filePrefix: options.prefix,
  });
  const files = new FileSetManager({
    directory: config.directory,
    filePrefix: config.filePrefix,
    backfill: config.backfill,
    pollIntervalMs: config.pollIntervalSeconds * 1000,
  });

  const abort = new AbortController();
  const removeSignals = onStopSignals(() => abort.abort(), io);
  try {
    for await (const measurement of files.watch({ signal: abort.signal })) {
      io.out(formatMeasurement(measurement));
    }
  } finally {
    removeSignals();
  }
}

export function buildProgram(io: CliIo = defaultIo): Command {
  const program = new Command();

  program
    .name("trace-harvester")
    .description("Harvest measurements from instrument CSV exports into SQLite");

  program
    .command("ingest", { isDefault: true })
    .description("Store new measurements from AutoExportTrace_*.csv files")
    .option("-d, --dir <directory>", "directory to watch (env HARVEST_DIR)")
    .option("--db <path>", "SQLite database file (env HARVEST_DB)")
    .option(
      "-i, --interval <seconds>",
      `polling interval in seconds (default ${DEFAULT_POLL_INTERVAL_SECONDS})`,
      parsePositiveNumber,
    )
    .option("--backfill", "process lines already present in files at startup")
    .option("--mode <mode>", "durability mode: safe, balanced or aggressive", parseMode)
    .option("--batch-rows <count>", "commit after this many rows", parsePositiveInteger)
    .option("--batch-seconds <seconds>", "commit after this many seconds", parsePositiveNumber)
    .option("--progress", "print every stored measurement")
    .option("--wake-on-change", "poll as soon as an export file changes")
    .option("--prefix <prefix>", "export file name prefix")
    .action(async (options: IngestCliOptions) => {
      await runIngest(options, io);
    });

  program
    .command("tail")
    .description("Print new measurements without storing them")
    .option("-d, --dir <directory>", "directory to watch (env HARVEST_DIR)")
    .option("-i, --interval <seconds>", "polling interval in seconds", parsePositiveNumber)
    .option("--backfill", "print lines already present in files at startup")
    .option("--prefix <prefix>", "export file name prefix")
    .action(async (options: TailCliOptions) => {
      await runTail(options, io);
    });

  return program;
}
