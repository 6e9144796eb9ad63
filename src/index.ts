/**
 * Ledger Sync Worker — Entry Point
 *
 * Runs one reconcile → balance → valuation iteration against every broker in
 * the broker snapshot file and exits. Exit code 0 on a completed iteration,
 * 1 otherwise; the process supervisor is expected to restart the worker.
 */

import path from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "./config/index.js";
import { logger } from "./utils/logger.js";
import { openLedgerStore } from "./storage/ledger-store.js";
import { loadBrokerSnapshots } from "./api/brokers/snapshot-gateway.js";
import { YahooPriceOracle } from "./api/market-data/yahoo.js";
import { SyncOrchestrator } from "./sync/orchestrator.js";

/**
 * Build the worker from configuration and run a single iteration.
 */
async function main(): Promise<number> {
  const config = loadConfig();
  logger.level = config.logLevel;

  logger.info("═══ Ledger Sync Worker ═══");
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Ledger: ${config.ledgerPath}`);

  // ── 1. Ledger + brokers ───────────────────────────────────
  const store = openLedgerStore(config.ledgerPath);
  const brokers = loadBrokerSnapshots(config.brokerSnapshotPath);

  // ── 2. Orchestrator ───────────────────────────────────────
  const { timeoutSeconds, ...options } = config.sync;
  const orchestrator = new SyncOrchestrator({
    store,
    oracle: new YahooPriceOracle(),
    options,
  });

  orchestrator.on("broker_failed", (result) => {
    if (result.status === "error") {
      logger.warn(`Broker ${result.broker} skipped this iteration: ${result.error}`);
    }
  });

  // ── 3. One iteration ──────────────────────────────────────
  const outcome = await orchestrator.runIteration(brokers, timeoutSeconds);

  if (outcome.status === "completed") {
    const failed = outcome.brokers.filter((b) => b.status === "error").length;
    logger.info(
      `Iteration completed: ${outcome.brokers.length - failed}/${outcome.brokers.length} brokers synced, ` +
      `${outcome.valuation?.priced ?? 0} positions valued`
    );
    return 0;
  }

  logger.error(`Iteration ${outcome.status}: ${outcome.error.message}`);
  return 1;
}

// ── Exports ─────────────────────────────────────────────────
export { SyncOrchestrator } from "./sync/orchestrator.js";
export { reconcileSnapshot, PositionReconciler } from "./sync/reconcile.js";
export { BalanceDeriver } from "./sync/balances.js";
export { PositionValuer } from "./sync/valuation.js";
export { computeProfitLoss, ProfitLossCalculator } from "./accounting/profit-loss.js";
export { TradeLedger } from "./accounting/trade-ledger.js";
export { JsonFileLedgerStore, MemoryLedgerStore, openLedgerStore } from "./storage/ledger-store.js";
export { LedgerSession } from "./storage/session.js";
export type { BrokerGateway, BrokerRegistry, PriceOracle } from "./types/broker.js";

// Run if executed directly
if (process.argv[1] && fileURLToPath(import.meta.url) === path.resolve(process.argv[1])) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      logger.error("Fatal error", { error: err });
      process.exit(1);
    });
}
