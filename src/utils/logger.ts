/**
 * Sync worker logging.
 *
 * Each engine stage (reconcile, balances, valuation, orchestrator, ledger
 * store) logs through its own child, so one iteration's lines can be followed
 * per stage and per broker. Silent under NODE_ENV=test; the entry point raises
 * or lowers the level from LOG_LEVEL.
 */

import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const componentTag = component ? `[${component}]` : "[system]";
  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${timestamp} ${level} ${componentTag} ${message}${metaStr}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
  format: combine(
    errors({ stack: true }),
    timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), logFormat),
    }),
  ],
});

/** Create a child logger tagged with a component name */
export function componentLogger(component: string) {
  return logger.child({ component });
}
