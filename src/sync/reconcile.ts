/**
 * Position Reconciliation
 *
 * Merges broker-reported positions into the ledger without losing the strategy
 * tags users assigned. The merge itself is a pure function over two snapshots
 * that returns a diff; PositionReconciler fetches the inputs, applies the diff
 * to a ledger session and commits it as one unit of work.
 *
 * Passes, in order (grow must see the shrunk and pruned state):
 *   1. shrink — uncategorized rows absent at the broker are deleted; the rest
 *               are clamped to max(brokerQty - categorizedQty, 0)
 *   2. prune  — any row whose symbol the broker no longer holds is deleted
 *   3. grow   — broker symbols with no ledger row become uncategorized rows
 *               (when enabled); matched rows follow the broker
 *
 * Categorized rows summing above the broker quantity are reported as
 * discrepancies, never rewritten.
 */

import { componentLogger } from "../utils/logger.js";
import { describeError } from "../utils/errors.js";
import type { BrokerService } from "../api/brokers/broker-service.js";
import type { BrokerPosition } from "../types/broker.js";
import type { SyncOptions } from "../config/index.js";
import type { LedgerSession } from "../storage/session.js";
import {
  UNCATEGORIZED,
  positionKey,
  type LedgerPosition,
} from "../types/ledger.js";

const log = componentLogger("reconcile");

// =============================================================================
// Types
// =============================================================================

export type PositionRef = Pick<LedgerPosition, "broker" | "symbol" | "strategy">;

export type ReconcileReason =
  | "uncategorized_gone"    // uncategorized row, symbol no longer at broker
  | "symbol_gone"           // any row, symbol no longer at broker
  | "uncategorized_excess"  // uncategorized above broker minus categorized
  | "uncategorized_resize"  // uncategorized follows broker minus categorized
  | "broker_quantity";      // sole categorized row follows broker

export interface PositionDelete {
  ref: PositionRef;
  reason: ReconcileReason;
}

export interface PositionUpdate {
  ref: PositionRef;
  previousQuantity: number;
  quantity: number;
  reasons: ReconcileReason[];
}

export interface PositionInsert {
  broker: string;
  symbol: string;
  quantity: number;
}

/** Categorized rows of a symbol summing above what the broker holds */
export interface ReconcileDiscrepancy {
  kind: "categorized_excess";
  symbol: string;
  brokerQuantity: number;
  categorizedQuantity: number;
}

export interface ReconcileDiff {
  toDelete: PositionDelete[];
  /** Rows surviving the merge that the broker still holds; quantity may be unchanged */
  toUpdate: PositionUpdate[];
  toInsert: PositionInsert[];
  /** Broker symbols with no ledger row, whether or not they are inserted */
  discovered: string[];
  /** Reported only; categorized splits are never rewritten to resolve them */
  discrepancies: ReconcileDiscrepancy[];
}

interface WorkingRow {
  ref: PositionRef;
  symbol: string;
  strategy: string;
  quantity: number;
  original: number;
  reasons: ReconcileReason[];
}

export interface ReconcileSnapshotOptions {
  createUncategorizedPositions: boolean;
}

// =============================================================================
// Pure merge
// =============================================================================

/** Broker quantity left over once categorized rows are subtracted, never negative */
export function netBrokerQuantity(brokerQuantity: number, categorizedQuantity: number): number {
  return Math.max(brokerQuantity - categorizedQuantity, 0);
}

function categorizedQuantity(rows: WorkingRow[], symbol: string): number {
  return rows
    .filter((r) => r.symbol === symbol && r.strategy !== UNCATEGORIZED)
    .reduce((sum, r) => sum + r.quantity, 0);
}

/**
 * Diff a broker's positions against that broker's ledger rows.
 * Neither input is mutated.
 */
export function reconcileSnapshot(
  broker: string,
  brokerPositions: Record<string, BrokerPosition>,
  ledgerPositions: LedgerPosition[],
  options: ReconcileSnapshotOptions
): ReconcileDiff {
  const working: WorkingRow[] = ledgerPositions
    .filter((p) => p.broker === broker)
    .map((p) => ({
      ref: { broker, symbol: p.symbol, strategy: p.strategy },
      symbol: p.symbol,
      strategy: p.strategy,
      quantity: p.quantity,
      original: p.quantity,
      reasons: [],
    }));
  const toDelete: PositionDelete[] = [];
  const deleted = new Set<string>();

  const remove = (row: WorkingRow, reason: ReconcileReason) => {
    const key = positionKey(row.ref);
    if (deleted.has(key)) return;
    deleted.add(key);
    toDelete.push({ ref: row.ref, reason });
  };
  const alive = () => working.filter((r) => !deleted.has(positionKey(r.ref)));

  // ── 1. Shrink ────────────────────────────────────────────
  for (const row of alive()) {
    if (row.strategy !== UNCATEGORIZED) continue;
    const held = brokerPositions[row.symbol];
    if (!held) {
      remove(row, "uncategorized_gone");
      continue;
    }
    const net = netBrokerQuantity(held.quantity, categorizedQuantity(alive(), row.symbol));
    if (row.quantity > net) {
      row.quantity = net;
      row.reasons.push("uncategorized_excess");
    }
  }

  // ── 2. Prune ─────────────────────────────────────────────
  for (const row of alive()) {
    if (!(row.symbol in brokerPositions)) {
      remove(row, "symbol_gone");
    }
  }

  // ── 3. Grow ──────────────────────────────────────────────
  const remaining = alive();
  const toInsert: PositionInsert[] = [];
  const discovered: string[] = [];

  for (const [symbol, held] of Object.entries(brokerPositions)) {
    const rows = remaining.filter((r) => r.symbol === symbol);
    if (rows.length === 0) {
      discovered.push(symbol);
      if (options.createUncategorizedPositions) {
        toInsert.push({ broker, symbol, quantity: Math.max(held.quantity, 0) });
      }
      continue;
    }

    const categorized = rows.filter((r) => r.strategy !== UNCATEGORIZED);
    const uncategorized = rows.find((r) => r.strategy === UNCATEGORIZED);

    if (categorized.length === 1 && !uncategorized) {
      // Sole owner of the symbol tracks the broker exactly
      if (categorized[0].quantity !== held.quantity) {
        categorized[0].quantity = held.quantity;
        categorized[0].reasons.push("broker_quantity");
      }
    } else if (uncategorized) {
      // Excess beyond the categorized split belongs to uncategorized
      const net = netBrokerQuantity(held.quantity, categorizedQuantity(categorized, symbol));
      if (uncategorized.quantity !== net) {
        uncategorized.quantity = net;
        uncategorized.reasons.push("uncategorized_resize");
      }
    }
  }

  // ── Invariant check ──────────────────────────────────────
  const discrepancies: ReconcileDiscrepancy[] = [];
  for (const [symbol, held] of Object.entries(brokerPositions)) {
    if (!remaining.some((r) => r.symbol === symbol && r.strategy !== UNCATEGORIZED)) continue;
    const categorized = categorizedQuantity(remaining, symbol);
    if (Math.abs(categorized) > Math.abs(held.quantity)) {
      discrepancies.push({
        kind: "categorized_excess",
        symbol,
        brokerQuantity: held.quantity,
        categorizedQuantity: categorized,
      });
    }
  }

  const toUpdate: PositionUpdate[] = remaining.map((r) => ({
    ref: r.ref,
    previousQuantity: r.original,
    quantity: r.quantity,
    reasons: r.reasons,
  }));

  return { toDelete, toUpdate, toInsert, discovered, discrepancies };
}

// =============================================================================
// Applying the diff
// =============================================================================

export interface ReconcileSummary {
  broker: string;
  deleted: number;
  resized: number;
  inserted: number;
  discovered: string[];
  discrepancies: ReconcileDiscrepancy[];
}

export class PositionReconciler {
  constructor(
    private readonly brokerService: BrokerService,
    private readonly options: SyncOptions
  ) {}

  async reconcile(session: LedgerSession, broker: string, asOf: Date = new Date()): Promise<ReconcileSummary> {
    const now = asOf.toISOString();
    const brokerPositions = await this.brokerService.getPositions(broker);
    const diff = reconcileSnapshot(broker, brokerPositions, session.positions({ broker }), {
      createUncategorizedPositions: this.options.createUncategorizedPositions,
    });

    for (const { ref, reason } of diff.toDelete) {
      session.deletePosition(ref);
      log.info(`Removed position ${ref.symbol}/${ref.strategy} from ledger (${reason})`, { broker });
    }

    let resized = 0;
    for (const update of diff.toUpdate) {
      if (update.quantity !== update.previousQuantity) {
        resized++;
        log.info(`Updating ${update.ref.symbol}/${update.ref.strategy} quantity`, {
          broker,
          oldQuantity: update.previousQuantity,
          quantity: update.quantity,
          reasons: update.reasons,
        });
      }
      session.updatePosition(update.ref, { quantity: update.quantity, lastUpdated: now });
    }

    for (const d of diff.discrepancies) {
      log.warn(`Categorized ${d.symbol} exceeds broker quantity`, {
        broker,
        brokerQuantity: d.brokerQuantity,
        categorizedQuantity: d.categorizedQuantity,
      });
    }

    for (const symbol of diff.discovered) {
      log.warn(`Found uncategorized position in broker: ${symbol}`, { broker });
    }

    for (const insert of diff.toInsert) {
      const price = await this.brokerService.getLatestPrice(broker, insert.symbol);
      if (price === null) {
        log.warn(`No price for new uncategorized position ${insert.symbol}, valuation will fill it`, { broker });
      }
      session.insertPosition({
        broker,
        symbol: insert.symbol,
        strategy: UNCATEGORIZED,
        quantity: insert.quantity,
        latestPrice: price ?? 0,
        costBasis: null,
        underlyingLatestPrice: null,
        underlyingVolatility: null,
        lastUpdated: now,
      });
      log.info(`Added uncategorized position to ledger: ${insert.symbol}`, { broker });
    }

    if (this.options.refreshCostBasis) {
      await this.refreshCostBases(session, broker);
    }

    await session.commit();
    log.info(`Reconciliation for broker ${broker} completed`);

    return {
      broker,
      deleted: diff.toDelete.length,
      resized,
      inserted: diff.toInsert.length,
      discovered: diff.discovered,
      discrepancies: diff.discrepancies,
    };
  }

  /**
   * Copy broker cost bases onto surviving rows; failures keep the old value.
   * A symbol split across strategies is skipped, since the broker's figure
   * covers the whole holding.
   */
  private async refreshCostBases(session: LedgerSession, broker: string): Promise<void> {
    const rows = session.positions({ broker });
    for (const position of rows) {
      if (rows.filter((r) => r.symbol === position.symbol).length > 1) continue;
      log.debug(`Fetching cost basis for ${position.symbol}`);
      try {
        const costBasis = await this.brokerService.getCostBasis(broker, position.symbol);
        if (costBasis === null) {
          log.error(`Failed to retrieve cost basis for ${position.symbol}`, { broker });
          continue;
        }
        session.updatePosition(position, { costBasis });
        log.info(`Updated cost basis for ${position.symbol}: ${costBasis}`, { broker });
      } catch (err) {
        log.error(`Error updating cost basis for ${position.symbol}`, { broker, error: describeError(err) });
      }
    }
  }
}
