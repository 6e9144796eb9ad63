/**
 * Error types that are allowed to escape the sync worker.
 * Everything else is logged and resolved to an "unavailable" result.
 */

/** Invalid startup configuration (bad ledger handle, bad env). */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The iteration ran past its deadline. */
export class IterationTimeoutError extends Error {
  constructor(readonly timeoutSeconds: number) {
    super(`Iteration exceeded the maximum allowed time of ${timeoutSeconds}s`);
    this.name = "IterationTimeoutError";
  }
}

/** A trade was asked to leave a state it already left. */
export class TradeTransitionError extends Error {
  constructor(tradeId: string, from: string, to: string) {
    super(`Trade ${tradeId} cannot move from ${from} to ${to}`);
    this.name = "TradeTransitionError";
  }
}

/** Render an unknown thrown value for a log line. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
