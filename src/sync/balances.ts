/**
 * Balance Derivation
 *
 * Per broker, appends a cash/positions/total snapshot for every real strategy,
 * then an "uncategorized" plug so that the strategies' totals add up to the
 * account value the broker reports:
 *
 *   positions(s)   = Σ price × quantity × multiplier   (100 options, contract size futures)
 *   total(s)       = cash(s) + positions(s)
 *   uncategorized  = max(0, accountValue − Σ total(s))
 *
 * Cash is carried forward from the latest cash row; cash movements are
 * recorded elsewhere. A strategy whose positions cannot all be priced gets no
 * rows this cycle and enters the plug at its last recorded cash + positions.
 */

import { componentLogger } from "../utils/logger.js";
import { describeError } from "../utils/errors.js";
import { valueMultiplier } from "../utils/symbols.js";
import type { BrokerService } from "../api/brokers/broker-service.js";
import type { LedgerSession } from "../storage/session.js";
import { UNCATEGORIZED, type BalanceType } from "../types/ledger.js";

const log = componentLogger("balances");

export interface StrategyBalance {
  strategy: string;
  cash: number;
  positions: number;
  total: number;
}

export interface BalanceSummary {
  broker: string;
  accountValue: number;
  strategies: StrategyBalance[];
  /** Strategies left without rows this cycle because a position could not be valued */
  skipped: string[];
  uncategorized: number;
}

export class BalanceDeriver {
  constructor(private readonly brokerService: BrokerService) {}

  async deriveBalances(session: LedgerSession, broker: string, asOf: Date = new Date()): Promise<BalanceSummary> {
    const timestamp = asOf.toISOString();
    const strategies = this.realStrategies(session, broker);

    const derived: StrategyBalance[] = [];
    const skipped: string[] = [];
    let categorizedSum = 0;
    for (const strategy of strategies) {
      let balance: StrategyBalance;
      try {
        balance = await this.strategyBalance(session, broker, strategy);
      } catch (err) {
        skipped.push(strategy);
        const carried = this.storedBalance(session, broker, strategy);
        categorizedSum += carried.total;
        log.error(`Skipping balances for strategy ${strategy}`, {
          broker,
          error: describeError(err),
          carriedTotal: carried.total,
        });
        continue;
      }

      this.append(session, broker, strategy, "cash", balance.cash, timestamp);
      this.append(session, broker, strategy, "positions", balance.positions, timestamp);
      this.append(session, broker, strategy, "total", balance.total, timestamp);
      log.debug(`Strategy: ${strategy}, Cash: ${balance.cash}, Positions: ${balance.positions}`, { broker });
      categorizedSum += balance.total;
      derived.push(balance);
    }

    const uncategorized = await this.deriveUncategorized(session, broker, categorizedSum, timestamp);

    await session.commit();
    log.info(`Updated all strategy balances for broker ${broker}`, {
      strategies: derived.length,
      skipped: skipped.length,
      uncategorized: uncategorized.value,
    });

    return {
      broker,
      accountValue: uncategorized.accountValue,
      strategies: derived,
      skipped,
      uncategorized: uncategorized.value,
    };
  }

  /** Strategies holding positions or balance history, minus the catch-all bucket */
  realStrategies(session: LedgerSession, broker: string): string[] {
    return session.strategies(broker).filter((s) => s !== UNCATEGORIZED);
  }

  async strategyBalance(session: LedgerSession, broker: string, strategy: string): Promise<StrategyBalance> {
    const cash = session.balances.latest(broker, strategy, "cash")?.value ?? 0;
    const positions = await this.positionsValue(session, broker, strategy);
    return { strategy, cash, positions, total: cash + positions };
  }

  /** Market value of a strategy's positions at current broker prices */
  async positionsValue(session: LedgerSession, broker: string, strategy: string): Promise<number> {
    let total = 0;
    for (const position of session.positions({ broker, strategy })) {
      const price = await this.brokerService.getLatestPrice(broker, position.symbol);
      if (price === null) {
        throw new Error(`No price for ${position.symbol} (strategy ${strategy})`);
      }
      total += price * position.quantity * valueMultiplier(position.symbol);
    }
    return total;
  }

  /** Last recorded cash and positions rows, for a strategy that cannot be valued now */
  private storedBalance(session: LedgerSession, broker: string, strategy: string): StrategyBalance {
    const cash = session.balances.latest(broker, strategy, "cash")?.value ?? 0;
    const positions = session.balances.latest(broker, strategy, "positions")?.value ?? 0;
    return { strategy, cash, positions, total: cash + positions };
  }

  /**
   * The plug row. The categorized sum comes from the values derived this
   * cycle, not from the rows just appended.
   */
  private async deriveUncategorized(
    session: LedgerSession,
    broker: string,
    categorizedSum: number,
    timestamp: string
  ): Promise<{ accountValue: number; value: number }> {
    const accountInfo = await this.brokerService.getAccountInfo(broker);
    const accountValue = accountInfo.value;

    log.info(`Broker ${broker}: Total account value: ${accountValue}, Categorized balance sum: ${categorizedSum}`);
    const value = Math.max(0, accountValue - categorizedSum);

    this.append(session, broker, UNCATEGORIZED, "cash", value, timestamp);
    this.append(session, broker, UNCATEGORIZED, "positions", 0, timestamp);
    this.append(session, broker, UNCATEGORIZED, "total", value, timestamp);
    session.upsertAccountInfo({ broker, value: accountValue, updatedAt: timestamp });

    return { accountValue, value };
  }

  private append(
    session: LedgerSession,
    broker: string,
    strategy: string,
    type: BalanceType,
    value: number,
    timestamp: string
  ): void {
    session.appendBalance({ broker, strategy, type, value, timestamp });
    log.debug(`Updated ${type} balance for strategy ${strategy}: ${value}`, { broker });
  }
}
