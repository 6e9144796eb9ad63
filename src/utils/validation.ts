/**
 * Input validation utilities.
 */

import { z } from "zod";

/** Validate a ledger symbol: equity, OCC option or slash-prefixed futures */
export const SymbolSchema = z
  .string()
  .min(1)
  .max(24)
  .regex(/^\/?[A-Z0-9. ]+$/, "Symbol must be uppercase letters, digits, dots or a leading slash");

/** Validate a new trade handed over by the execution layer */
export const TradeInputSchema = z.object({
  id: z.string().min(1).optional(),
  broker: z.string().min(1),
  symbol: SymbolSchema,
  strategy: z.string().min(1),
  side: z.enum(["buy", "sell"]),
  quantity: z.number().positive(),
  executedPrice: z.number().positive().nullable().default(null),
});

export type TradeInput = z.input<typeof TradeInputSchema>;

/** Generate a unique id for ledger records */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}
