/**
 * Shared test fixtures: in-process broker gateways and price oracles.
 */

import type {
  BrokerAccountInfo,
  BrokerGateway,
  BrokerPosition,
  PriceOracle,
} from "../src/types/broker.js";
import type { LedgerPosition } from "../src/types/ledger.js";

export const T0 = new Date("2024-06-03T14:30:00.000Z");
export const T1 = new Date("2024-06-03T14:35:00.000Z");

export function ledgerPosition(overrides: Partial<LedgerPosition> & Pick<LedgerPosition, "symbol">): LedgerPosition {
  return {
    broker: "paper",
    strategy: "alpha",
    quantity: 0,
    latestPrice: 0,
    costBasis: null,
    underlyingLatestPrice: null,
    underlyingVolatility: null,
    lastUpdated: "2024-06-01T00:00:00.000Z",
    ...overrides,
  };
}

export interface FakeBrokerState {
  positions?: Record<string, number>;
  prices?: Record<string, number>;
  accountValue?: number;
  costBases?: Record<string, number>;
  /** Symbols whose price lookup throws */
  failingPrices?: string[];
  /** Milliseconds getPositions waits before answering */
  positionsDelayMs?: number;
}

/** Async gateway backed by plain objects; counts calls */
export class FakeBroker implements BrokerGateway {
  calls = { getCurrentPrice: 0, getPositions: 0, getAccountInfo: 0, getCostBasis: 0 };

  constructor(public state: FakeBrokerState = {}) {}

  async getCurrentPrice(symbol: string): Promise<number | null> {
    this.calls.getCurrentPrice++;
    if (this.state.failingPrices?.includes(symbol)) {
      throw new Error(`quote service unavailable for ${symbol}`);
    }
    return this.state.prices?.[symbol] ?? null;
  }

  async getPositions(): Promise<Record<string, BrokerPosition>> {
    this.calls.getPositions++;
    if (this.state.positionsDelayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.state.positionsDelayMs));
    }
    const entries = Object.entries(this.state.positions ?? {});
    return Object.fromEntries(entries.map(([symbol, quantity]) => [symbol, { symbol, quantity }]));
  }

  async getAccountInfo(): Promise<BrokerAccountInfo> {
    this.calls.getAccountInfo++;
    return { value: this.state.accountValue ?? 0 };
  }

  async getCostBasis(symbol: string): Promise<number | null> {
    this.calls.getCostBasis++;
    return this.state.costBases?.[symbol] ?? null;
  }
}

/** Synchronous gateway, to check that sync answers are awaited the same way */
export class SyncFakeBroker implements BrokerGateway {
  constructor(private readonly inner: FakeBrokerState) {}

  getCurrentPrice(symbol: string): number | null {
    return this.inner.prices?.[symbol] ?? null;
  }

  getPositions(): Record<string, BrokerPosition> {
    const entries = Object.entries(this.inner.positions ?? {});
    return Object.fromEntries(entries.map(([symbol, quantity]) => [symbol, { symbol, quantity }]));
  }

  getAccountInfo(): BrokerAccountInfo {
    return { value: this.inner.accountValue ?? 0 };
  }

  getCostBasis(symbol: string): number | null {
    return this.inner.costBases?.[symbol] ?? null;
  }
}

export class FakeOracle implements PriceOracle {
  constructor(
    private readonly prices: Record<string, number> = {},
    private readonly vols: Record<string, number> = {},
    private readonly failing: string[] = []
  ) {}

  async latestPrice(symbol: string): Promise<number | null> {
    return this.prices[symbol] ?? null;
  }

  async annualizedVolatility(symbol: string): Promise<number | null> {
    if (this.failing.includes(symbol)) {
      throw new Error(`no history for ${symbol}`);
    }
    return this.vols[symbol] ?? null;
  }
}
