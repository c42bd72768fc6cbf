import { z } from "zod";
import { durabilityModeSchema } from "./durability.js";
import { resolveDefaultDbPath, resolveUserPath } from "./paths.js";

export const DEFAULT_FILE_PREFIX = "AutoExportTrace_";
export const DEFAULT_POLL_INTERVAL_SECONDS = 1;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const flagSchema = z.preprocess((value) => {
  if (typeof value !== "string") {
    return value;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return value;
}, z.boolean());

export const harvestConfigSchema = z.object({
  directory: z.string().trim().min(1),
  dbPath: z.string().trim().min(1),
  pollIntervalSeconds: z.coerce.number().positive(),
  backfill: flagSchema,
  mode: durabilityModeSchema,
  batchRows: z.coerce.number().int().positive().optional(),
  batchSeconds: z.coerce.number().positive().optional(),
  progress: flagSchema,
  wakeOnChange: flagSchema,
  filePrefix: z.string().min(1),
});

export type HarvestConfig = z.infer<typeof harvestConfigSchema>;

export type HarvestConfigOverrides = {
  [K in keyof HarvestConfig]?: HarvestConfig[K] | undefined;
};

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    const details = issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    super(`Invalid harvester configuration: ${details}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const ENV_KEYS: Record<keyof HarvestConfig, string> = {
  directory: "HARVEST_DIR",
  dbPath: "HARVEST_DB",
  pollIntervalSeconds: "HARVEST_POLL_INTERVAL",
  backfill: "HARVEST_BACKFILL",
  mode: "HARVEST_MODE",
  batchRows: "HARVEST_BATCH_ROWS",
  batchSeconds: "HARVEST_BATCH_SECONDS",
  progress: "HARVEST_PROGRESS",
  wakeOnChange: "HARVEST_WAKE_ON_CHANGE",
  filePrefix: "HARVEST_FILE_PREFIX",
};

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw !== undefined && raw.trim() !== "") {
      values[key] = raw.trim();
    }
  }
  return values;
}

function definedEntries(overrides: HarvestConfigOverrides): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Builds the harvester configuration: defaults, then environment, then explicit overrides.
 */
export function loadHarvestConfig(
  overrides: HarvestConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): HarvestConfig {
  const raw = {
    directory: cwd,
    dbPath: resolveDefaultDbPath(cwd),
    pollIntervalSeconds: DEFAULT_POLL_INTERVAL_SECONDS,
    backfill: false,
    mode: "safe",
    progress: false,
    wakeOnChange: false,
    filePrefix: DEFAULT_FILE_PREFIX,
    ...readEnv(env),
    ...definedEntries(overrides),
  };

  const parsed = harvestConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  return {
    ...parsed.data,
    directory: resolveUserPath(parsed.data.directory, cwd),
    dbPath: parsed.data.dbPath === ":memory:" ? ":memory:" : resolveUserPath(parsed.data.dbPath, cwd),
  };
}
