/**
 * Snapshot Broker Gateway
 *
 * Serves positions, quotes, account value and cost bases from a broker
 * snapshot file (default data/brokers.json), one entry per broker. Lets the
 * sync worker run against exported broker state without a live connection.
 *
 *   {
 *     "paper": {
 *       "accountValue": 25000,
 *       "positions": [{ "symbol": "AAPL", "quantity": 10, "costBasis": 1700 }],
 *       "prices": { "AAPL": 190.5 }
 *     }
 *   }
 */

import fs from "fs";
import { z } from "zod";
import { componentLogger } from "../../utils/logger.js";
import type {
  BrokerAccountInfo,
  BrokerGateway,
  BrokerPosition,
  BrokerRegistry,
} from "../../types/broker.js";

const log = componentLogger("snapshot-broker");

// ── Schema ──────────────────────────────────────────────────

const SnapshotPositionSchema = z.object({
  symbol: z.string().min(1),
  quantity: z.number(),
  costBasis: z.number().nullable().optional(),
});

export const BrokerSnapshotSchema = z.object({
  accountValue: z.number(),
  positions: z.array(SnapshotPositionSchema).default([]),
  prices: z.record(z.number()).default({}),
});

export const BrokerSnapshotFileSchema = z.record(BrokerSnapshotSchema);

export type BrokerSnapshot = z.infer<typeof BrokerSnapshotSchema>;

// ── Gateway ─────────────────────────────────────────────────

/** Synchronous gateway over an in-memory broker snapshot */
export class SnapshotBrokerGateway implements BrokerGateway {
  private readonly positions: Map<string, BrokerPosition>;
  private readonly costBases: Map<string, number>;

  constructor(private readonly snapshot: BrokerSnapshot) {
    this.positions = new Map();
    this.costBases = new Map();
    for (const p of snapshot.positions) {
      const existing = this.positions.get(p.symbol);
      this.positions.set(p.symbol, {
        symbol: p.symbol,
        quantity: (existing?.quantity ?? 0) + p.quantity,
      });
      if (typeof p.costBasis === "number") {
        this.costBases.set(p.symbol, (this.costBases.get(p.symbol) ?? 0) + p.costBasis);
      }
    }
  }

  getCurrentPrice(symbol: string): number | null {
    return this.snapshot.prices[symbol] ?? null;
  }

  getPositions(): Record<string, BrokerPosition> {
    return Object.fromEntries(
      [...this.positions].map(([symbol, p]) => [symbol, { ...p }])
    );
  }

  getAccountInfo(): BrokerAccountInfo {
    return { value: this.snapshot.accountValue };
  }

  getCostBasis(symbol: string): number | null {
    return this.costBases.get(symbol) ?? null;
  }
}

/**
 * Build a registry of snapshot gateways from a broker snapshot file.
 * Throws on a missing or malformed file.
 */
export function loadBrokerSnapshots(filePath: string): BrokerRegistry {
  const raw = fs.readFileSync(filePath, "utf-8");
  const parsed = BrokerSnapshotFileSchema.parse(JSON.parse(raw));

  const registry: BrokerRegistry = {};
  for (const [name, snapshot] of Object.entries(parsed)) {
    registry[name] = new SnapshotBrokerGateway(snapshot);
    log.info(`Loaded broker snapshot ${name}: ${snapshot.positions.length} positions`);
  }
  return registry;
}
