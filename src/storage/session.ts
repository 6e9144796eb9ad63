/**
 * Ledger Session — unit of work
 *
 * Loads the ledger once, stages changes against a working copy, and writes the
 * whole document on commit. rollback() discards everything staged since the
 * last commit. A session bound to an abort signal refuses to commit once the
 * signal fires, so nothing lands after an iteration's deadline.
 */

import { componentLogger } from "../utils/logger.js";
import { BalanceLog } from "./balance-log.js";
import type { LedgerStore } from "./ledger-store.js";
import {
  positionKey,
  type AccountInfo,
  type LedgerPosition,
  type LedgerState,
  type Trade,
} from "../types/ledger.js";

const log = componentLogger("ledger-session");

export class LedgerSession {
  private working: LedgerState;
  private dirty = false;
  private signal: AbortSignal | null = null;
  private balanceLog: BalanceLog;

  private constructor(
    private readonly store: LedgerStore,
    private committed: LedgerState
  ) {
    this.working = structuredClone(committed);
    this.balanceLog = new BalanceLog(this.working.balances);
  }

  static async open(store: LedgerStore): Promise<LedgerSession> {
    const state = await store.load();
    return new LedgerSession(store, state);
  }

  /** Refuse further commits once the signal aborts */
  bindSignal(signal: AbortSignal): void {
    this.signal = signal;
  }

  /** Append-only balance rows of the working copy */
  get balances(): BalanceLog {
    return this.balanceLog;
  }

  get hasPendingChanges(): boolean {
    return this.dirty;
  }

  // ─── Positions ────────────────────────────────────────────

  positions(filter: Partial<Pick<LedgerPosition, "broker" | "symbol" | "strategy">> = {}): LedgerPosition[] {
    return this.working.positions.filter(
      (p) =>
        (filter.broker === undefined || p.broker === filter.broker) &&
        (filter.symbol === undefined || p.symbol === filter.symbol) &&
        (filter.strategy === undefined || p.strategy === filter.strategy)
    );
  }

  /** Match by (broker, symbol, strategy); warns when the key is not unique */
  findPosition(broker: string, symbol: string, strategy: string): LedgerPosition | null {
    const matches = this.positions({ broker, symbol, strategy });
    if (matches.length > 1) {
      log.warn("Multiple positions found", { broker, symbol, strategy });
    }
    return matches[0] ?? null;
  }

  insertPosition(position: LedgerPosition): void {
    const key = positionKey(position);
    if (this.working.positions.some((p) => positionKey(p) === key)) {
      throw new Error(`Position ${key} already exists`);
    }
    this.working.positions.push({ ...position });
    this.dirty = true;
  }

  updatePosition(
    key: Pick<LedgerPosition, "broker" | "symbol" | "strategy">,
    patch: Partial<Omit<LedgerPosition, "broker" | "symbol" | "strategy">>
  ): void {
    const target = this.findPosition(key.broker, key.symbol, key.strategy);
    if (!target) {
      throw new Error(`Position ${positionKey(key)} not found`);
    }
    Object.assign(target, patch);
    this.dirty = true;
  }

  deletePosition(key: Pick<LedgerPosition, "broker" | "symbol" | "strategy">): void {
    const k = positionKey(key);
    const before = this.working.positions.length;
    this.working.positions = this.working.positions.filter((p) => positionKey(p) !== k);
    if (this.working.positions.length !== before) this.dirty = true;
  }

  /** Distinct strategies holding positions or balances for a broker */
  strategies(broker: string): string[] {
    const fromPositions = this.positions({ broker }).map((p) => p.strategy);
    return [...new Set([...fromPositions, ...this.balances.strategies(broker)])];
  }

  /** Throws, changing nothing, when a renamed row would collide with an existing key */
  renameStrategyPositions(broker: string, from: string, to: string): number {
    const rows = this.positions({ broker, strategy: from });
    if (from !== to) {
      const collisions = rows.filter((row) => this.findPosition(broker, row.symbol, to) !== null);
      if (collisions.length > 0) {
        const symbols = collisions.map((row) => row.symbol).join(", ");
        throw new Error(`Strategy ${to} already holds ${symbols} at ${broker}, rename refused`);
      }
    }
    for (const row of rows) row.strategy = to;
    if (rows.length > 0) this.dirty = true;
    return rows.length;
  }

  // ─── Balances ─────────────────────────────────────────────

  appendBalance(...args: Parameters<BalanceLog["append"]>): void {
    this.balances.append(...args);
    this.dirty = true;
  }

  renameStrategyBalances(broker: string, from: string, to: string): number {
    const touched = this.balances.renameStrategy(broker, from, to);
    if (touched > 0) this.dirty = true;
    return touched;
  }

  // ─── Trades ───────────────────────────────────────────────

  trades(filter: Partial<Pick<Trade, "broker" | "strategy" | "status">> = {}): Trade[] {
    return this.working.trades.filter(
      (t) =>
        (filter.broker === undefined || t.broker === filter.broker) &&
        (filter.strategy === undefined || t.strategy === filter.strategy) &&
        (filter.status === undefined || t.status === filter.status)
    );
  }

  findTrade(id: string): Trade | null {
    return this.working.trades.find((t) => t.id === id) ?? null;
  }

  insertTrade(trade: Trade): void {
    if (this.findTrade(trade.id)) {
      throw new Error(`Trade ${trade.id} already exists`);
    }
    this.working.trades.push({ ...trade });
    this.dirty = true;
  }

  updateTrade(id: string, patch: Partial<Omit<Trade, "id">>): void {
    const trade = this.findTrade(id);
    if (!trade) throw new Error(`Trade ${id} not found`);
    Object.assign(trade, patch);
    this.dirty = true;
  }

  // ─── Account info ─────────────────────────────────────────

  accountInfo(broker: string): AccountInfo | null {
    return this.working.accountInfo.find((a) => a.broker === broker) ?? null;
  }

  upsertAccountInfo(info: AccountInfo): void {
    const existing = this.accountInfo(info.broker);
    if (existing) {
      existing.value = info.value;
      existing.updatedAt = info.updatedAt;
    } else {
      this.working.accountInfo.push({ ...info });
    }
    this.dirty = true;
  }

  // ─── Unit of work ─────────────────────────────────────────

  async commit(): Promise<void> {
    if (this.signal?.aborted) {
      throw new Error("Ledger session aborted, commit refused");
    }
    if (!this.dirty) return;
    const next = structuredClone(this.working);
    await this.store.save(next);
    this.committed = next;
    this.dirty = false;
  }

  rollback(): void {
    this.working = structuredClone(this.committed);
    // BalanceLog holds a reference to the working array
    this.balanceLog = new BalanceLog(this.working.balances);
    this.dirty = false;
  }
}
