/**
 * Realized Profit/Loss
 *
 * Computed once, when a trade fills, against the ledger position with the same
 * broker + symbol + strategy as it stood before the fill:
 *
 *   buy, flat or long         → none (opening)
 *   buy against a short       → (|costBasis| / |posQty| − price) × |tradeQty|
 *   sell, whole position      → price × tradeQty − costBasis
 *   sell, part of position    → (price − costBasis / posQty) × tradeQty
 *
 * Sells of futures scale by contract size, sells of options by 100.
 */

import { componentLogger } from "../utils/logger.js";
import { describeError } from "../utils/errors.js";
import {
  OPTION_MULTIPLIER,
  contractSize,
  isFuturesSymbol,
  isOption,
} from "../utils/symbols.js";
import type { LedgerSession } from "../storage/session.js";
import type { LedgerPosition, Trade } from "../types/ledger.js";

const log = componentLogger("profit-loss");

export type ProfitLossTrade = Pick<Trade, "id" | "broker" | "symbol" | "strategy" | "side" | "quantity" | "executedPrice">;

export type ProfitLossKind = "opening_buy" | "short_cover" | "full_sell" | "partial_sell";

export interface ProfitLossResult {
  kind: ProfitLossKind;
  profitLoss: number | null;
}

/** Realized P/L of covering part or all of a short */
function shortCoverProfitLoss(position: LedgerPosition, costBasis: number, price: number, tradeQty: number): number {
  const costPerShare = Math.abs(costBasis) / Math.abs(position.quantity);
  return (costPerShare - price) * Math.abs(tradeQty);
}

/**
 * Pure P/L rule set. Throws when the inputs cannot produce a figure
 * (missing executed price, sell without a position or cost basis).
 */
export function computeProfitLoss(trade: ProfitLossTrade, position: LedgerPosition | null): ProfitLossResult {
  const price = trade.executedPrice;
  if (price === null || !Number.isFinite(price)) {
    throw new Error(`Trade ${trade.id} has no executed price`);
  }

  if (trade.side === "buy") {
    if (!position || position.quantity >= 0) {
      return { kind: "opening_buy", profitLoss: null };
    }
    if (position.costBasis === null) {
      throw new Error(`Short ${position.symbol} has no cost basis`);
    }
    return {
      kind: "short_cover",
      profitLoss: shortCoverProfitLoss(position, position.costBasis, price, trade.quantity),
    };
  }

  if (!position) {
    throw new Error(`No position for ${trade.symbol}/${trade.strategy} to sell against`);
  }
  if (position.costBasis === null) {
    throw new Error(`Position ${position.symbol} has no cost basis`);
  }
  if (position.quantity === 0) {
    throw new Error(`Position ${position.symbol} is flat`);
  }

  let kind: ProfitLossKind;
  let profitLoss: number;
  if (position.quantity === trade.quantity) {
    kind = "full_sell";
    profitLoss = price * trade.quantity - position.costBasis;
  } else {
    kind = "partial_sell";
    profitLoss = (price - position.costBasis / position.quantity) * trade.quantity;
  }

  if (isFuturesSymbol(trade.symbol)) {
    profitLoss *= contractSize(trade.symbol);
  }
  if (isOption(trade.symbol)) {
    profitLoss *= OPTION_MULTIPLIER;
  }

  return { kind, profitLoss };
}

/**
 * Session-backed calculator. Never throws: anything that prevents a figure is
 * logged and comes back as null.
 */
export class ProfitLossCalculator {
  profitLoss(session: LedgerSession, trade: ProfitLossTrade): number | null {
    log.info("Calculating profit/loss", { tradeId: trade.id, symbol: trade.symbol, side: trade.side });

    if (trade.executedPrice === null) {
      log.error("Executed price is missing, cannot calculate profit/loss", { tradeId: trade.id });
      return null;
    }

    try {
      const position = session.findPosition(trade.broker, trade.symbol, trade.strategy);
      if (!position) {
        log.warn("Position not found", { broker: trade.broker, symbol: trade.symbol, strategy: trade.strategy });
      }

      const { kind, profitLoss } = computeProfitLoss(trade, position);
      log.info(`Profit/loss calculated (${kind})`, { tradeId: trade.id, profitLoss });
      return profitLoss;
    } catch (err) {
      log.error("Failed to calculate profit/loss", { tradeId: trade.id, error: describeError(err) });
      return null;
    }
  }
}
