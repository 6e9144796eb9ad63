/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

/** "true"/"1"/"yes" → true, anything else set → false, unset → default */
const envFlag = (fallback: boolean) =>
  z.preprocess(
    (v) => (typeof v === "string" ? ["true", "1", "yes"].includes(v.trim().toLowerCase()) : v),
    z.boolean().default(fallback)
  );

const ConfigSchema = z.object({
  // Ledger
  ledgerPath: z.string().min(1).default("data/ledger.json"),

  // Brokers
  brokerSnapshotPath: z.string().min(1).default("data/brokers.json"),

  // Sync worker
  sync: z.object({
    // setTimeout holds at most 2^31 - 1 ms
    timeoutSeconds: z.coerce.number().positive().max(2_147_483).default(120),
    // Reconciliation has not been validated against live broker data yet
    reconcilePositions: envFlag(false),
    createUncategorizedPositions: envFlag(false),
    refreshCostBasis: envFlag(false),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Feature switches handed to the sync engine at construction */
export type SyncOptions = Omit<Config["sync"], "timeoutSeconds">;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    ledgerPath: env.LEDGER_PATH,
    brokerSnapshotPath: env.BROKER_SNAPSHOT_PATH,
    sync: {
      timeoutSeconds: env.SYNC_TIMEOUT_SECONDS,
      reconcilePositions: env.RECONCILE_POSITIONS,
      createUncategorizedPositions: env.CREATE_UNCATEGORIZED_POSITIONS,
      refreshCostBasis: env.REFRESH_COST_BASIS,
    },
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
  };

  return ConfigSchema.parse(raw);
}
