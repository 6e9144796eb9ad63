/**
 * Sync Orchestrator Tests
 */

import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { SyncOrchestrator, type BrokerSyncResult } from "../../src/sync/orchestrator.js";
import { JsonFileLedgerStore, MemoryLedgerStore } from "../../src/storage/ledger-store.js";
import { IterationTimeoutError } from "../../src/utils/errors.js";
import type { SyncOptions } from "../../src/config/index.js";
import { FakeBroker, FakeOracle, T0, ledgerPosition } from "../helpers.js";

const defaults: SyncOptions = {
  reconcilePositions: false,
  createUncategorizedPositions: false,
  refreshCostBasis: false,
};

function orchestrator(store: MemoryLedgerStore, options: Partial<SyncOptions> = {}) {
  return new SyncOrchestrator({
    store,
    oracle: new FakeOracle(),
    options: { ...defaults, ...options },
    clock: () => T0,
  });
}

describe("SyncOrchestrator", () => {
  it("should keep going when one broker fails", async () => {
    const store = new MemoryLedgerStore({
      positions: [
        ledgerPosition({ broker: "bad", symbol: "XYZ", quantity: 1 }),
        ledgerPosition({ broker: "good", symbol: "SPY", quantity: 2 }),
      ],
    });
    const sync = orchestrator(store);
    const failed: BrokerSyncResult[] = [];
    sync.on("broker_failed", (result) => failed.push(result));

    const outcome = await sync.runIteration(
      {
        bad: new FakeBroker({ accountValue: Number.NaN }),
        good: new FakeBroker({ prices: { SPY: 500 }, accountValue: 1500 }),
      },
      5
    );

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;

    expect(outcome.brokers).toEqual([
      { broker: "bad", status: "error", error: "Broker bad reported a non-finite account value" },
      {
        broker: "good",
        status: "ok",
        reconcile: null,
        balances: {
          broker: "good",
          accountValue: 1500,
          strategies: [{ strategy: "alpha", cash: 0, positions: 1000, total: 1000 }],
          skipped: [],
          uncategorized: 500,
        },
      },
    ]);
    expect(failed.map((r) => r.broker)).toEqual(["bad"]);
    expect(outcome.valuation).toEqual({ priced: 1, withVolatility: 0, failed: ["XYZ"] });
    expect(sync.currentPhase).toBe("completed");

    const state = store.snapshot();
    expect(new Set(state.balances.map((b) => b.broker))).toEqual(new Set(["good"]));
    expect(state.positions.find((p) => p.symbol === "SPY")?.latestPrice).toBe(500);
  });

  it("should reconcile before deriving balances when enabled", async () => {
    const store = new MemoryLedgerStore({
      positions: [
        ledgerPosition({ symbol: "SYM", strategy: "alpha", quantity: 60 }),
        ledgerPosition({ symbol: "SYM", strategy: "uncategorized", quantity: 50 }),
      ],
    });
    const broker = new FakeBroker({ positions: { SYM: 100 }, prices: { SYM: 10 }, accountValue: 2000 });

    const outcome = await orchestrator(store, { reconcilePositions: true }).runIteration({ paper: broker }, 5);

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    const [result] = outcome.brokers;
    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.reconcile).toEqual({
      broker: "paper",
      deleted: 0,
      resized: 1,
      inserted: 0,
      discovered: [],
      discrepancies: [],
    });
    expect(result.balances.uncategorized).toBe(1400);
    expect(store.snapshot().positions.map((p) => p.quantity)).toEqual([60, 40]);
  });

  it("should keep the ledger file loadable when a broker reports garbage", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ledger-"));
    try {
      const file = path.join(dir, "ledger.json");
      const store = new JsonFileLedgerStore(file);
      const sync = new SyncOrchestrator({ store, oracle: new FakeOracle(), options: defaults, clock: () => T0 });
      const brokers = {
        paper: new FakeBroker({ accountValue: Number.POSITIVE_INFINITY }),
        spare: new FakeBroker({ accountValue: 250 }),
      };

      const first = await sync.runIteration(brokers, 5);
      const second = await sync.runIteration(brokers, 5);

      expect(first.status).toBe("completed");
      expect(second.status).toBe("completed");
      const state = await store.load();
      expect(state.balances.every((b) => b.broker === "spare" && Number.isFinite(b.value))).toBe(true);
      expect(state.accountInfo).toEqual([{ broker: "spare", value: 250, updatedAt: T0.toISOString() }]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should only revalue positions of configured brokers", async () => {
    const legacy = ledgerPosition({ broker: "legacy", symbol: "OLD", quantity: 1, latestPrice: 3 });
    const store = new MemoryLedgerStore({ positions: [legacy] });

    const outcome = await orchestrator(store).runIteration({ paper: new FakeBroker({ accountValue: 10 }) }, 5);

    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.valuation).toEqual({ priced: 0, withVolatility: 0, failed: [] });
    expect(store.snapshot().positions).toEqual([legacy]);
  });

  it("should emit lifecycle events in order", async () => {
    const sync = orchestrator(new MemoryLedgerStore());
    const events: string[] = [];
    sync.on("iteration_started", () => events.push("started"));
    sync.on("broker_synced", (r) => events.push(`synced:${r.broker}`));
    sync.on("iteration_finished", (o) => events.push(`finished:${o.status}`));

    await sync.runIteration({ a: new FakeBroker(), b: new FakeBroker() }, 5);

    expect(events).toEqual(["started", "synced:a", "synced:b", "finished:completed"]);
  });

  it("should time out without writing anything after the deadline", async () => {
    const store = new MemoryLedgerStore({
      positions: [ledgerPosition({ symbol: "SYM", quantity: 5 })],
    });
    const broker = new FakeBroker({
      positions: { SYM: 5 },
      prices: { SYM: 10 },
      accountValue: 100,
      positionsDelayMs: 100,
    });
    const sync = orchestrator(store, { reconcilePositions: true });

    const outcome = await sync.runIteration({ paper: broker, other: new FakeBroker() }, 0.02);

    expect(outcome.status).toBe("timed_out");
    if (outcome.status !== "timed_out") return;
    expect(outcome.error).toBeInstanceOf(IterationTimeoutError);
    expect(outcome.error.message).toBe("Iteration exceeded the maximum allowed time of 0.02s");
    expect(sync.currentPhase).toBe("timed_out");

    // Let the abandoned work reach its commit
    await new Promise((resolve) => setTimeout(resolve, 200));

    expect(store.saves).toBe(0);
    expect(store.snapshot().balances).toEqual([]);
    expect(broker.calls.getAccountInfo).toBe(0);
  });

  it("should refuse to start a second iteration while one runs", async () => {
    const sync = orchestrator(new MemoryLedgerStore(), { reconcilePositions: true });
    const slow = { paper: new FakeBroker({ positionsDelayMs: 30 }) };

    const first = sync.runIteration(slow, 5);
    const second = await sync.runIteration(slow, 5);

    expect(second.status).toBe("failed");
    expect(sync.currentPhase).toBe("running");
    expect((await first).status).toBe("completed");
  });
});
