/**
 * Trade Ledger
 *
 * Trade lifecycle and ledger maintenance outside the periodic sync:
 *   - Trades are recorded open, then filled or cancelled exactly once
 *   - Realized P/L is computed at fill time and never recomputed
 *   - Strategy renames carry positions, balances and trades together
 *   - Latest account value per broker
 *
 * Each call runs in its own ledger session. Failures are logged and come back
 * as null/false/[] rather than thrown.
 */

import { componentLogger } from "../utils/logger.js";
import { TradeTransitionError, describeError } from "../utils/errors.js";
import { TradeInputSchema, generateId, type TradeInput } from "../utils/validation.js";
import { LedgerSession } from "../storage/session.js";
import type { LedgerStore } from "../storage/ledger-store.js";
import { ProfitLossCalculator } from "./profit-loss.js";
import type { AccountInfo, Trade, TradeStatus } from "../types/ledger.js";

const log = componentLogger("trade-ledger");

export interface RenameSummary {
  positions: number;
  balances: number;
  trades: number;
}

export class TradeLedger {
  constructor(
    private readonly store: LedgerStore,
    private readonly calculator: ProfitLossCalculator = new ProfitLossCalculator()
  ) {}

  async recordTrade(input: TradeInput, at: Date = new Date()): Promise<Trade | null> {
    const parsed = TradeInputSchema.safeParse(input);
    if (!parsed.success) {
      log.error("Rejected trade input", { issues: parsed.error.issues.map((i) => i.message) });
      return null;
    }

    const trade: Trade = {
      ...parsed.data,
      id: parsed.data.id ?? generateId(),
      status: "open",
      profitLoss: null,
      createdAt: at.toISOString(),
      closedAt: null,
    };

    return this.withSession("record trade", async (session) => {
      session.insertTrade(trade);
      await session.commit();
      log.info(`Recorded open ${trade.side} ${trade.quantity} ${trade.symbol}`, { tradeId: trade.id });
      return trade;
    });
  }

  async getTrade(id: string): Promise<Trade | null> {
    return this.withSession("retrieve trade", async (session) => {
      const trade = session.findTrade(id);
      if (!trade) log.warn(`No trade found with id ${id}`);
      return trade;
    });
  }

  async getOpenTrades(): Promise<Trade[]> {
    const trades = await this.withSession("retrieve open trades", async (session) => session.trades({ status: "open" }));
    return trades ?? [];
  }

  async getAllTrades(): Promise<Trade[]> {
    const trades = await this.withSession("retrieve all trades", async (session) => session.trades());
    return trades ?? [];
  }

  /**
   * Mark an open trade filled at the executed price and store its realized P/L.
   */
  async fillTrade(id: string, executedPrice: number, at: Date = new Date()): Promise<Trade | null> {
    return this.withSession("fill trade", async (session) => {
      const trade = this.openTrade(session, id, "filled");
      const filled: Trade = { ...trade, executedPrice };
      const profitLoss = this.calculator.profitLoss(session, filled);

      session.updateTrade(id, {
        executedPrice,
        status: "filled",
        profitLoss,
        closedAt: at.toISOString(),
      });
      await session.commit();
      log.info(`Trade ${id} filled at ${executedPrice}`, { profitLoss });
      return session.findTrade(id);
    });
  }

  async cancelTrade(id: string, at: Date = new Date()): Promise<Trade | null> {
    return this.withSession("cancel trade", async (session) => {
      this.openTrade(session, id, "cancelled");
      session.updateTrade(id, { status: "cancelled", closedAt: at.toISOString() });
      await session.commit();
      log.info(`Trade ${id} cancelled`);
      return session.findTrade(id);
    });
  }

  async getProfitLoss(id: string): Promise<number | null> {
    const trade = await this.getTrade(id);
    return trade?.profitLoss ?? null;
  }

  async renameStrategy(broker: string, from: string, to: string): Promise<RenameSummary | null> {
    return this.withSession("rename strategy", async (session) => {
      log.info(`Renaming strategy ${from} → ${to}`, { broker });
      const positions = session.renameStrategyPositions(broker, from, to);
      const balances = session.renameStrategyBalances(broker, from, to);

      let trades = 0;
      for (const trade of session.trades({ broker, strategy: from })) {
        session.updateTrade(trade.id, { strategy: to });
        trades++;
      }

      await session.commit();
      log.info(`Updated ${positions} positions, ${balances} balances, ${trades} trades`, { broker });
      return { positions, balances, trades };
    });
  }

  async recordAccountInfo(broker: string, value: number, at: Date = new Date()): Promise<AccountInfo | null> {
    return this.withSession("record account info", async (session) => {
      const info: AccountInfo = { broker, value, updatedAt: at.toISOString() };
      session.upsertAccountInfo(info);
      await session.commit();
      log.debug("Recorded account info", { broker, value });
      return info;
    });
  }

  private openTrade(session: LedgerSession, id: string, to: TradeStatus): Trade {
    const trade = session.findTrade(id);
    if (!trade) {
      throw new Error(`No trade found with id ${id}`);
    }
    if (trade.status !== "open") {
      throw new TradeTransitionError(id, trade.status, to);
    }
    return trade;
  }

  private async withSession<T>(action: string, fn: (session: LedgerSession) => Promise<T>): Promise<T | null> {
    let session: LedgerSession | null = null;
    try {
      session = await LedgerSession.open(this.store);
      return await fn(session);
    } catch (err) {
      session?.rollback();
      log.error(`Failed to ${action}`, { error: describeError(err) });
      return null;
    }
  }
}
