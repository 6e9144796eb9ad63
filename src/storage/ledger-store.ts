/**
 * Ledger persistence — JSON file storage
 *
 * Stores positions, the balance log, trades and account values in one JSON
 * document (default data/ledger.json). Atomic writes (tmp + rename).
 * A missing file is an empty ledger; a corrupt file is an error.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { componentLogger } from "../utils/logger.js";
import { ConfigurationError } from "../utils/errors.js";
import { emptyLedgerState, type LedgerState } from "../types/ledger.js";

const log = componentLogger("ledger-store");

// ── Schema ──────────────────────────────────────────────────

const TimestampSchema = z.string().datetime({ offset: true });

export const LedgerPositionSchema = z.object({
  broker: z.string().min(1),
  symbol: z.string().min(1),
  strategy: z.string().min(1),
  quantity: z.number(),
  latestPrice: z.number().default(0),
  costBasis: z.number().nullable().default(null),
  underlyingLatestPrice: z.number().nullable().default(null),
  underlyingVolatility: z.number().nullable().default(null),
  lastUpdated: TimestampSchema,
});

export const BalanceEntrySchema = z.object({
  broker: z.string().min(1),
  strategy: z.string().min(1),
  type: z.enum(["cash", "positions", "total"]),
  value: z.number(),
  timestamp: TimestampSchema,
});

export const TradeSchema = z.object({
  id: z.string().min(1),
  broker: z.string().min(1),
  symbol: z.string().min(1),
  strategy: z.string().min(1),
  side: z.enum(["buy", "sell"]),
  quantity: z.number().positive(),
  executedPrice: z.number().nullable().default(null),
  status: z.enum(["open", "filled", "cancelled"]),
  profitLoss: z.number().nullable().default(null),
  createdAt: TimestampSchema,
  closedAt: TimestampSchema.nullable().default(null),
});

export const AccountInfoSchema = z.object({
  broker: z.string().min(1),
  value: z.number(),
  updatedAt: TimestampSchema,
});

export const LedgerStateSchema = z.object({
  version: z.literal(1),
  positions: z.array(LedgerPositionSchema).default([]),
  balances: z.array(BalanceEntrySchema).default([]),
  trades: z.array(TradeSchema).default([]),
  accountInfo: z.array(AccountInfoSchema).default([]),
});

// ── Stores ──────────────────────────────────────────────────

/** Transactional backing store for ledger sessions */
export interface LedgerStore {
  load(): Promise<LedgerState>;
  save(state: LedgerState): Promise<void>;
}

export class JsonFileLedgerStore implements LedgerStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<LedgerState> {
    if (!fs.existsSync(this.filePath)) {
      log.info(`No ledger at ${this.filePath}, starting empty`);
      return emptyLedgerState();
    }
    const raw = fs.readFileSync(this.filePath, "utf-8");
    const state = LedgerStateSchema.parse(JSON.parse(raw));
    log.debug(`Loaded ledger: ${state.positions.length} positions, ${state.balances.length} balance rows`);
    return state;
  }

  async save(state: LedgerState): Promise<void> {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    // Atomic write: write to tmp file, then rename
    const tmpFile = this.filePath + ".tmp";
    fs.writeFileSync(tmpFile, JSON.stringify(state, null, 2), "utf-8");
    fs.renameSync(tmpFile, this.filePath);
  }
}

/** Process-local store, used by tests and dry runs */
export class MemoryLedgerStore implements LedgerStore {
  private state: LedgerState;
  saves = 0;

  constructor(initial: Partial<LedgerState> = {}) {
    this.state = { ...emptyLedgerState(), ...structuredClone(initial) };
  }

  async load(): Promise<LedgerState> {
    return structuredClone(this.state);
  }

  async save(state: LedgerState): Promise<void> {
    this.state = structuredClone(state);
    this.saves++;
  }

  /** Committed state, for inspection */
  snapshot(): LedgerState {
    return structuredClone(this.state);
  }
}

function isLedgerStore(value: unknown): value is LedgerStore {
  if (typeof value !== "object" || value === null) return false;
  return (
    "load" in value && typeof value.load === "function" &&
    "save" in value && typeof value.save === "function"
  );
}

/**
 * Resolve a ledger handle: a file path or a ready store.
 * Anything else is a startup configuration error.
 */
export function openLedgerStore(handle: unknown): LedgerStore {
  if (typeof handle === "string" && handle.trim().length > 0) {
    return new JsonFileLedgerStore(handle);
  }
  if (isLedgerStore(handle)) {
    return handle;
  }
  throw new ConfigurationError(
    "Invalid ledger handle. Expected a file path or a LedgerStore object."
  );
}
