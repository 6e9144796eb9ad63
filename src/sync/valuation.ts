/**
 * Position Valuation
 *
 * Refreshes latest price, underlying price and underlying volatility on ledger
 * positions. Each position is handled on its own: a failed quote or volatility
 * lookup is logged and the batch moves on. One commit after the whole batch.
 */

import { componentLogger } from "../utils/logger.js";
import { describeError } from "../utils/errors.js";
import { extractUnderlying } from "../utils/symbols.js";
import type { BrokerService } from "../api/brokers/broker-service.js";
import type { PriceOracle } from "../types/broker.js";
import type { LedgerSession } from "../storage/session.js";
import type { LedgerPosition } from "../types/ledger.js";

const log = componentLogger("valuation");

export interface ValuationSummary {
  priced: number;
  withVolatility: number;
  failed: string[];
}

export class PositionValuer {
  constructor(
    private readonly brokerService: BrokerService,
    private readonly oracle: PriceOracle
  ) {}

  async revalue(session: LedgerSession, positions: LedgerPosition[], asOf: Date = new Date()): Promise<ValuationSummary> {
    const summary: ValuationSummary = { priced: 0, withVolatility: 0, failed: [] };
    const now = asOf.toISOString();

    for (const position of positions) {
      try {
        const outcome = await this.revaluePosition(session, position, now);
        if (outcome === "skipped") {
          summary.failed.push(position.symbol);
          continue;
        }
        summary.priced++;
        if (outcome === "with_volatility") summary.withVolatility++;
      } catch (err) {
        summary.failed.push(position.symbol);
        log.error(`Error processing position ${position.symbol}`, {
          broker: position.broker,
          error: describeError(err),
        });
      }
    }

    await session.commit();
    log.info("Completed updating latest prices and volatility", {
      priced: summary.priced,
      failed: summary.failed.length,
    });
    return summary;
  }

  private async revaluePosition(
    session: LedgerSession,
    position: LedgerPosition,
    now: string
  ): Promise<"skipped" | "price_only" | "with_volatility"> {
    const latestPrice = await this.fetchPrice(position);
    if (latestPrice === null) return "skipped";

    session.updatePosition(position, { latestPrice, lastUpdated: now });

    const underlying = extractUnderlying(position.symbol);
    const underlyingPrice = await this.fetchUnderlyingPrice(position, underlying, latestPrice);
    const volatility = await this.fetchVolatility(underlying);

    if (volatility === null || underlyingPrice === null) {
      log.error(`Could not calculate volatility for ${underlying}`, { symbol: position.symbol });
      return "price_only";
    }

    session.updatePosition(position, {
      underlyingVolatility: volatility,
      underlyingLatestPrice: underlyingPrice,
    });
    log.debug(`Updated volatility for ${position.symbol} to ${volatility}`);
    return "with_volatility";
  }

  private async fetchPrice(position: LedgerPosition): Promise<number | null> {
    try {
      const price = await this.brokerService.getLatestPrice(position.broker, position.symbol);
      if (price === null) {
        log.error(`Could not get latest price for ${position.symbol}`, { broker: position.broker });
      } else {
        log.debug(`Updated latest price for ${position.symbol} to ${price}`);
      }
      return price;
    } catch (err) {
      log.error(`Could not get latest price for ${position.symbol}`, {
        broker: position.broker,
        error: describeError(err),
      });
      return null;
    }
  }

  private async fetchVolatility(underlying: string): Promise<number | null> {
    try {
      return await this.oracle.annualizedVolatility(underlying);
    } catch (err) {
      log.warn(`Volatility lookup for ${underlying} failed`, { error: describeError(err) });
      return null;
    }
  }

  /** Broker quote first, oracle as fallback */
  private async fetchUnderlyingPrice(
    position: LedgerPosition,
    underlying: string,
    latestPrice: number
  ): Promise<number | null> {
    if (underlying === position.symbol) {
      return latestPrice;
    }
    try {
      const price = await this.brokerService.getLatestPrice(position.broker, underlying);
      if (price !== null) return price;
    } catch (err) {
      log.warn(`Broker quote for underlying ${underlying} failed`, { error: describeError(err) });
    }
    try {
      return await this.oracle.latestPrice(underlying);
    } catch (err) {
      log.warn(`Oracle quote for underlying ${underlying} failed`, { error: describeError(err) });
      return null;
    }
  }
}
