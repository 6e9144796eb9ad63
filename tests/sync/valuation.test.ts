/**
 * Position Valuation Tests
 */

import { describe, it, expect } from "vitest";
import { PositionValuer } from "../../src/sync/valuation.js";
import { BrokerService } from "../../src/api/brokers/broker-service.js";
import { MemoryLedgerStore } from "../../src/storage/ledger-store.js";
import { LedgerSession } from "../../src/storage/session.js";
import { FakeBroker, FakeOracle, T0, ledgerPosition } from "../helpers.js";

describe("PositionValuer", () => {
  const positions = [
    ledgerPosition({ symbol: "AAPL", quantity: 10 }),
    ledgerPosition({ symbol: "AAPL240119C00150000", quantity: 1 }),
    ledgerPosition({ symbol: "MSFT240119C00400000", quantity: 1 }),
    ledgerPosition({ symbol: "TSLA", quantity: 3 }),
    ledgerPosition({ symbol: "NOPE", quantity: 1, latestPrice: 7 }),
    ledgerPosition({ symbol: "ERR", quantity: 1, latestPrice: 9 }),
  ];
  const broker = () =>
    new FakeBroker({
      prices: { AAPL: 190, AAPL240119C00150000: 4.1, MSFT240119C00400000: 2, TSLA: 180, ERR: 1 },
      failingPrices: ["ERR"],
    });
  const oracle = new FakeOracle({ MSFT: 410, AAPL: 999 }, { AAPL: 0.25, MSFT: 0.3 }, ["TSLA"]);

  async function revalueAll() {
    const store = new MemoryLedgerStore({ positions });
    const valuer = new PositionValuer(new BrokerService({ paper: broker() }), oracle);
    const session = await LedgerSession.open(store);
    const summary = await valuer.revalue(session, session.positions(), T0);
    const bySymbol = Object.fromEntries(store.snapshot().positions.map((p) => [p.symbol, p]));
    return { store, summary, bySymbol };
  }

  it("should isolate failures and commit the batch once", async () => {
    const { store, summary } = await revalueAll();

    expect(summary).toEqual({ priced: 4, withVolatility: 3, failed: ["NOPE", "ERR"] });
    expect(store.saves).toBe(1);
  });

  it("should use an equity's own price as its underlying price", async () => {
    const { bySymbol } = await revalueAll();

    expect(bySymbol.AAPL).toMatchObject({
      latestPrice: 190,
      underlyingLatestPrice: 190,
      underlyingVolatility: 0.25,
      lastUpdated: T0.toISOString(),
    });
  });

  it("should prefer the broker quote for an option's underlying", async () => {
    const { bySymbol } = await revalueAll();

    expect(bySymbol.AAPL240119C00150000).toMatchObject({
      latestPrice: 4.1,
      underlyingLatestPrice: 190,
      underlyingVolatility: 0.25,
    });
  });

  it("should fall back to the oracle for an underlying the broker cannot quote", async () => {
    const { bySymbol } = await revalueAll();

    expect(bySymbol.MSFT240119C00400000).toMatchObject({
      latestPrice: 2,
      underlyingLatestPrice: 410,
      underlyingVolatility: 0.3,
    });
  });

  it("should keep the new price when volatility is unavailable", async () => {
    const { bySymbol } = await revalueAll();

    expect(bySymbol.TSLA).toMatchObject({
      latestPrice: 180,
      underlyingLatestPrice: null,
      underlyingVolatility: null,
      lastUpdated: T0.toISOString(),
    });
  });

  it("should leave positions without a broker price untouched", async () => {
    const { bySymbol } = await revalueAll();

    expect(bySymbol.NOPE).toEqual(positions[4]);
    expect(bySymbol.ERR).toEqual(positions[5]);
  });
});
