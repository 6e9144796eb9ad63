/**
 * Balance Event Log
 *
 * Balances are never mutated: every derivation appends rows. The "current"
 * balance for (broker, strategy, type) is the row with the latest timestamp;
 * rows sharing a timestamp resolve to the one appended last.
 */

import type { BalanceEntry, BalanceType } from "../types/ledger.js";

export interface StrategyBalanceSnapshot {
  strategy: string;
  cash: number;
  positions: number;
  total: number;
  /** Latest timestamp among the three rows */
  asOf: string;
}

export class BalanceLog {
  constructor(private readonly entries: BalanceEntry[]) {}

  append(entry: BalanceEntry): void {
    this.entries.push({ ...entry });
  }

  /** All rows for a broker, in insertion order */
  history(broker: string, strategy?: string): BalanceEntry[] {
    return this.entries.filter(
      (e) => e.broker === broker && (strategy === undefined || e.strategy === strategy)
    );
  }

  latest(broker: string, strategy: string, type: BalanceType): BalanceEntry | null {
    let best: BalanceEntry | null = null;
    for (const entry of this.entries) {
      if (entry.broker !== broker || entry.strategy !== strategy || entry.type !== type) continue;
      if (!best || Date.parse(entry.timestamp) >= Date.parse(best.timestamp)) {
        best = entry;
      }
    }
    return best;
  }

  /** Strategies with at least one row for the broker */
  strategies(broker: string): string[] {
    const seen = new Set<string>();
    for (const entry of this.entries) {
      if (entry.broker === broker) seen.add(entry.strategy);
    }
    return [...seen];
  }

  /** Current cash/positions/total per strategy for a broker */
  currentSnapshot(broker: string): StrategyBalanceSnapshot[] {
    return this.strategies(broker).map((strategy) => {
      const cash = this.latest(broker, strategy, "cash");
      const positions = this.latest(broker, strategy, "positions");
      const total = this.latest(broker, strategy, "total");
      const stamps = [cash, positions, total]
        .filter((e): e is BalanceEntry => e !== null)
        .map((e) => e.timestamp)
        .sort((a, b) => Date.parse(a) - Date.parse(b));

      return {
        strategy,
        cash: cash?.value ?? 0,
        positions: positions?.value ?? 0,
        total: total?.value ?? 0,
        asOf: stamps[stamps.length - 1] ?? "",
      };
    });
  }

  /** Rename a strategy across every row of a broker; returns rows touched */
  renameStrategy(broker: string, from: string, to: string): number {
    let touched = 0;
    for (const entry of this.entries) {
      if (entry.broker === broker && entry.strategy === from) {
        entry.strategy = to;
        touched++;
      }
    }
    return touched;
  }
}
