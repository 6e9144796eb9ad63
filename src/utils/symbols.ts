/**
 * Symbol Classification Utilities
 *
 * Ledger symbols come in three shapes:
 *
 *   - Equities     → "AAPL", "BRK.B"
 *   - Options      → OCC format "AAPL240119C00150000"
 *                    (root, yyMMdd expiry, C/P, strike × 1000 padded to 8)
 *   - Futures      → leading slash, root, month code, year: "/ESZ24", "/MNQH5"
 *
 * Everything here is pure; no quotes or contract lookups.
 */

/** Shares per equity option contract */
export const OPTION_MULTIPLIER = 100;

const OCC_PATTERN = /^([A-Z][A-Z0-9.]{0,5})\s*(\d{6})([CP])(\d{8})$/;
const FUTURES_PATTERN = /^\/([A-Z0-9]{1,4}?)([FGHJKMNQUVXZ])(\d{1,2})$/;

/** Point value per contract, keyed by futures root */
const FUTURES_CONTRACT_SIZES: Record<string, number> = {
  ES: 50,
  MES: 5,
  NQ: 20,
  MNQ: 2,
  YM: 5,
  MYM: 0.5,
  RTY: 50,
  M2K: 5,
  CL: 1000,
  MCL: 100,
  NG: 10000,
  GC: 100,
  MGC: 10,
  SI: 5000,
  HG: 25000,
  ZB: 1000,
  ZN: 1000,
  ZC: 50,
  ZS: 50,
  ZW: 50,
};

export interface OptionDetails {
  underlying: string;
  expiration: Date;
  type: "call" | "put";
  strike: number;
}

export function isOption(symbol: string): boolean {
  return OCC_PATTERN.test(symbol);
}

export function isFuturesSymbol(symbol: string): boolean {
  return FUTURES_PATTERN.test(symbol);
}

/**
 * Parse an OCC option symbol. Returns null for anything else.
 */
export function extractOptionDetails(symbol: string): OptionDetails | null {
  const match = OCC_PATTERN.exec(symbol);
  if (!match) return null;

  const [, underlying, yymmdd, right, strike] = match;
  const year = 2000 + Number(yymmdd.slice(0, 2));
  const month = Number(yymmdd.slice(2, 4)) - 1;
  const day = Number(yymmdd.slice(4, 6));

  return {
    underlying,
    expiration: new Date(Date.UTC(year, month, day)),
    type: right === "C" ? "call" : "put",
    strike: Number(strike) / 1000,
  };
}

/**
 * Underlying symbol of an option; equities and futures are their own underlying.
 */
export function extractUnderlying(symbol: string): string {
  return extractOptionDetails(symbol)?.underlying ?? symbol;
}

/** Root of a futures symbol ("/ESZ24" → "ES"), or null */
export function futuresRoot(symbol: string): string | null {
  return FUTURES_PATTERN.exec(symbol)?.[1] ?? null;
}

/**
 * Contract size (point value) of a futures symbol.
 * Unknown roots and non-futures symbols are 1.
 */
export function contractSize(symbol: string): number {
  const root = futuresRoot(symbol);
  if (!root) return 1;
  return FUTURES_CONTRACT_SIZES[root] ?? 1;
}

/**
 * Factor turning price × quantity into market value.
 */
export function valueMultiplier(symbol: string): number {
  if (isOption(symbol)) return OPTION_MULTIPLIER;
  if (isFuturesSymbol(symbol)) return contractSize(symbol);
  return 1;
}
