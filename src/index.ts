export * from "./harvest/index.js";
export {
  ConfigError,
  DEFAULT_FILE_PREFIX,
  harvestConfigSchema,
  loadHarvestConfig,
  type HarvestConfig,
  type HarvestConfigOverrides,
} from "./config/config.js";
export {
  DURABILITY_PRESETS,
  resolveBatchPolicy,
  type BatchPolicy,
  type DurabilityMode,
} from "./config/durability.js";
export { openSampleDatabase } from "./store/sqlite.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/subsystem.js";
