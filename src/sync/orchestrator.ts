/**
 * Sync Orchestrator
 *
 * Runs one bounded iteration of the sync worker:
 *   1. Opens one ledger session
 *   2. Per broker: reconcile positions (when enabled), then derive balances
 *   3. Revalues every ledger position, across all brokers
 *   4. Commits whatever is still pending
 *
 * Each broker's stage-2 work is isolated: its failure is rolled back and
 * recorded, and the next broker proceeds. The whole iteration races a
 * deadline; when it fires the outcome is "timed_out", the session refuses
 * further commits and no new stage starts. Work committed before the deadline
 * stands. A timed-out iteration is meant to end the process so the
 * supervisor restarts it.
 *
 * Uses a state-machine pattern: idle → running → completed | timed_out | failed.
 */

import { EventEmitter } from "eventemitter3";
import { componentLogger } from "../utils/logger.js";
import { IterationTimeoutError, describeError } from "../utils/errors.js";
import { BrokerService } from "../api/brokers/broker-service.js";
import { LedgerSession } from "../storage/session.js";
import { PositionReconciler, type ReconcileSummary } from "./reconcile.js";
import { BalanceDeriver, type BalanceSummary } from "./balances.js";
import { PositionValuer, type ValuationSummary } from "./valuation.js";
import type { LedgerStore } from "../storage/ledger-store.js";
import type { BrokerRegistry, PriceOracle } from "../types/broker.js";
import type { SyncOptions } from "../config/index.js";

const log = componentLogger("orchestrator");

/** Iteration phases */
export type IterationPhase = "idle" | "running" | "completed" | "timed_out" | "failed";

export type BrokerSyncResult =
  | {
      broker: string;
      status: "ok";
      reconcile: ReconcileSummary | null;
      balances: BalanceSummary;
    }
  | {
      broker: string;
      status: "error";
      error: string;
    };

export type IterationOutcome =
  | {
      status: "completed";
      startedAt: Date;
      finishedAt: Date;
      brokers: BrokerSyncResult[];
      valuation: ValuationSummary | null;
    }
  | {
      status: "timed_out";
      startedAt: Date;
      error: IterationTimeoutError;
    }
  | {
      status: "failed";
      startedAt: Date;
      error: Error;
    };

/** Events emitted during an iteration */
interface SyncEvents {
  iteration_started: (startedAt: Date) => void;
  broker_synced: (result: BrokerSyncResult) => void;
  broker_failed: (result: BrokerSyncResult) => void;
  iteration_finished: (outcome: IterationOutcome) => void;
}

export interface OrchestratorDeps {
  store: LedgerStore;
  oracle: PriceOracle;
  options: SyncOptions;
  /** Source of the iteration timestamp */
  clock?: () => Date;
}

export class SyncOrchestrator extends EventEmitter<SyncEvents> {
  private phase: IterationPhase = "idle";
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    super();
    this.clock = deps.clock ?? (() => new Date());
  }

  get currentPhase(): IterationPhase {
    return this.phase;
  }

  /**
   * Run one iteration against the given brokers, bounded by timeoutSeconds.
   */
  async runIteration(brokers: BrokerRegistry, timeoutSeconds: number): Promise<IterationOutcome> {
    const startedAt = this.clock();
    if (this.phase === "running") {
      // Leaves the running iteration's phase alone
      return {
        status: "failed",
        startedAt,
        error: new Error("An iteration is already running against this ledger"),
      };
    }

    this.phase = "running";
    this.emit("iteration_started", startedAt);
    log.info("Starting sync worker iteration", { brokers: Object.keys(brokers), timeoutSeconds });

    const controller = new AbortController();
    let expire: () => void = () => undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      expire = () => resolve("timeout");
    });
    const timer = setTimeout(() => expire(), timeoutSeconds * 1000);

    const work = this.iterate(brokers, startedAt, controller.signal, timeoutSeconds);

    try {
      const winner = await Promise.race([work, deadline]);
      if (winner === "timeout") {
        controller.abort();
        // The abandoned iteration settles on its own; keep its rejection handled
        work.catch((err: unknown) => {
          log.debug("Abandoned iteration settled", { error: describeError(err) });
        });
        log.error("Iteration exceeded the maximum allowed time. Forcing restart.", { timeoutSeconds });
        return this.finish({
          status: "timed_out",
          startedAt,
          error: new IterationTimeoutError(timeoutSeconds),
        });
      }
      return this.finish(winner);
    } catch (err) {
      log.error("Sync worker iteration failed", { error: describeError(err) });
      return this.finish({
        status: "failed",
        startedAt,
        error: err instanceof Error ? err : new Error(String(err)),
      });
    } finally {
      clearTimeout(timer);
    }
  }

  // ─── Private Methods ────────────────────────────────────────

  private async iterate(
    brokers: BrokerRegistry,
    now: Date,
    signal: AbortSignal,
    timeoutSeconds: number
  ): Promise<IterationOutcome> {
    const checkDeadline = () => {
      if (signal.aborted) throw new IterationTimeoutError(timeoutSeconds);
    };

    const brokerService = new BrokerService(brokers);
    const reconciler = new PositionReconciler(brokerService, this.deps.options);
    const deriver = new BalanceDeriver(brokerService);
    const valuer = new PositionValuer(brokerService, this.deps.oracle);

    const session = await LedgerSession.open(this.deps.store);
    session.bindSignal(signal);
    log.info("Session started");

    // ── Stage 1: reconcile + balances, per broker ──────────
    const results: BrokerSyncResult[] = [];
    for (const broker of brokerService.brokerNames) {
      checkDeadline();
      const result = await this.syncBroker(session, broker, reconciler, deriver, now);
      results.push(result);
      this.emit(result.status === "ok" ? "broker_synced" : "broker_failed", result);
    }

    // ── Stage 2: valuation across all brokers ──────────────
    checkDeadline();
    let valuation: ValuationSummary | null = null;
    try {
      const positions = session.positions().filter((p) => p.broker in brokers);
      log.info(`Positions fetched: ${positions.length}`);
      valuation = await valuer.revalue(session, positions, now);
    } catch (err) {
      session.rollback();
      log.error("Error fetching and updating positions", { error: describeError(err) });
    }

    // ── Stage 3: commit anything left pending ──────────────
    checkDeadline();
    await session.commit();

    log.info("Sync worker completed an iteration");
    return {
      status: "completed",
      startedAt: now,
      finishedAt: this.clock(),
      brokers: results,
      valuation,
    };
  }

  private async syncBroker(
    session: LedgerSession,
    broker: string,
    reconciler: PositionReconciler,
    deriver: BalanceDeriver,
    now: Date
  ): Promise<BrokerSyncResult> {
    try {
      const reconcile = this.deps.options.reconcilePositions
        ? await reconciler.reconcile(session, broker, now)
        : null;
      const balances = await deriver.deriveBalances(session, broker, now);
      return { broker, status: "ok", reconcile, balances };
    } catch (err) {
      session.rollback();
      log.error(`Error reconciling broker and updating balances`, { broker, error: describeError(err) });
      return { broker, status: "error", error: describeError(err) };
    }
  }

  private finish(outcome: IterationOutcome): IterationOutcome {
    this.phase = outcome.status;
    this.emit("iteration_finished", outcome);
    return outcome;
  }
}
