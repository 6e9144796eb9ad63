/**
 * Ledger type definitions.
 * Positions, append-only balances, trades and account values as persisted.
 */

/** Strategy tag for broker-held quantity not yet assigned to a strategy */
export const UNCATEGORIZED = "uncategorized";

/** Ledger position, unique per (broker, symbol, strategy) */
export interface LedgerPosition {
  broker: string;
  symbol: string;
  strategy: string;
  /** Signed: negative = short */
  quantity: number;
  latestPrice: number;
  costBasis: number | null;
  underlyingLatestPrice: number | null;
  underlyingVolatility: number | null;
  /** ISO timestamp */
  lastUpdated: string;
}

export type BalanceType = "cash" | "positions" | "total";

/** One row of the append-only balance log */
export interface BalanceEntry {
  broker: string;
  strategy: string;
  type: BalanceType;
  value: number;
  /** ISO timestamp */
  timestamp: string;
}

export type TradeSide = "buy" | "sell";
export type TradeStatus = "open" | "filled" | "cancelled";

export interface Trade {
  id: string;
  broker: string;
  symbol: string;
  strategy: string;
  side: TradeSide;
  quantity: number;
  executedPrice: number | null;
  status: TradeStatus;
  profitLoss: number | null;
  createdAt: string;
  closedAt: string | null;
}

/** Latest reported account value per broker */
export interface AccountInfo {
  broker: string;
  value: number;
  updatedAt: string;
}

/** Everything the ledger persists */
export interface LedgerState {
  version: 1;
  positions: LedgerPosition[];
  balances: BalanceEntry[];
  trades: Trade[];
  accountInfo: AccountInfo[];
}

/** Key of a position row */
export function positionKey(p: Pick<LedgerPosition, "broker" | "symbol" | "strategy">): string {
  return `${p.broker}|${p.symbol}|${p.strategy}`;
}

export function emptyLedgerState(): LedgerState {
  return { version: 1, positions: [], balances: [], trades: [], accountInfo: [] };
}
