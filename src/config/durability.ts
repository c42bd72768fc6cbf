import { z } from "zod";

export const durabilityModeSchema = z.enum(["safe", "balanced", "aggressive"]);

export type DurabilityMode = z.infer<typeof durabilityModeSchema>;

export type DurabilityPreset = {
  /** Attempted rows between commits */
  batchRows: number;
  /** Seconds since the last commit before the next one is forced */
  batchSeconds: number;
  journalMode: "WAL" | "MEMORY";
  synchronous: "FULL" | "NORMAL" | "OFF";
};

/**
 * `balanced` and `aggressive` are meant for backfill runs.
 * `aggressive` can lose the last batches if the machine crashes.
 */
export const DURABILITY_PRESETS: Record<DurabilityMode, DurabilityPreset> = {
  safe: { batchRows: 250, batchSeconds: 2, journalMode: "WAL", synchronous: "FULL" },
  balanced: { batchRows: 5_000, batchSeconds: 15, journalMode: "WAL", synchronous: "NORMAL" },
  aggressive: { batchRows: 50_000, batchSeconds: 60, journalMode: "MEMORY", synchronous: "OFF" },
};

export type BatchPolicy = {
  batchRows: number;
  batchSeconds: number;
};

export function resolveBatchPolicy(params: {
  mode: DurabilityMode;
  batchRows?: number;
  batchSeconds?: number;
}): BatchPolicy {
  const preset = DURABILITY_PRESETS[params.mode];
  return {
    batchRows: params.batchRows ?? preset.batchRows,
    batchSeconds: params.batchSeconds ?? preset.batchSeconds,
  };
}
