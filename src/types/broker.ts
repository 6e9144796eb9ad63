/**
 * Broker gateway contract.
 *
 * Gateways may answer synchronously or asynchronously; BrokerService awaits
 * whichever comes back so the sync engine sees a single async surface.
 */

type MaybePromise<T> = T | Promise<T>;

/** Position as reported by a broker */
export interface BrokerPosition {
  symbol: string;
  quantity: number;
  [extra: string]: unknown;
}

/** Account summary as reported by a broker */
export interface BrokerAccountInfo {
  value: number;
  [extra: string]: unknown;
}

export interface BrokerGateway {
  getCurrentPrice(symbol: string): MaybePromise<number | null>;
  /** Keyed by symbol */
  getPositions(): MaybePromise<Record<string, BrokerPosition>>;
  getAccountInfo(): MaybePromise<BrokerAccountInfo>;
  getCostBasis(symbol: string): MaybePromise<number | null>;
}

/** Configured brokers, keyed by broker name */
export type BrokerRegistry = Record<string, BrokerGateway>;

/** Price and volatility source for valuation */
export interface PriceOracle {
  latestPrice(symbol: string): Promise<number | null>;
  /** Trailing annualized volatility (e.g. 0.25 = 25%) */
  annualizedVolatility(symbol: string): Promise<number | null>;
}
