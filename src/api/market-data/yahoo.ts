/**
 * Yahoo Finance Market Data — Price/Volatility Oracle
 *
 * Uses Yahoo Finance's public chart API to fetch:
 *   - Latest prices
 *   - One year of daily closes for trailing annualized volatility
 *
 * No API key required. Every failure resolves to null and a log line; a bad
 * symbol never throws into the valuation batch.
 */

import { z } from "zod";
import { componentLogger } from "../../utils/logger.js";
import { describeError } from "../../utils/errors.js";
import { futuresRoot } from "../../utils/symbols.js";
import type { PriceOracle } from "../../types/broker.js";

const log = componentLogger("yahoo");

const YAHOO_BASE = "https://query1.finance.yahoo.com/v8/finance/chart";
const TRADING_DAYS = 252;

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string().optional(),
            regularMarketPrice: z.number().optional(),
          }),
          indicators: z
            .object({
              quote: z.array(z.object({ close: z.array(z.number().nullable()).optional() })),
            })
            .optional(),
        })
      )
      .nullable(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof ChartResponseSchema>["chart"]["result"]>[number];

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface YahooOracleOptions {
  fetchFn?: FetchFn;
  quoteTtlMs?: number;
  volatilityTtlMs?: number;
  /** Fewest daily returns accepted for a volatility estimate */
  minReturns?: number;
}

/** Yahoo symbol for a ledger symbol ("/ESZ24" → "ES=F") */
export function toYahooSymbol(symbol: string): string {
  const root = futuresRoot(symbol);
  return root ? `${root}=F` : symbol.replace(".", "-");
}

/**
 * Sample standard deviation of simple daily returns, annualized.
 * Null when fewer than two returns exist.
 */
export function annualizedVolatilityFromCloses(closes: number[]): number | null {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    returns.push(closes[i] / closes[i - 1] - 1);
  }
  if (returns.length < 2) return null;

  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * Math.sqrt(TRADING_DAYS);
}

export class YahooPriceOracle implements PriceOracle {
  // ── In-memory cache to avoid hammering Yahoo ────────────────
  private readonly quoteCache: Map<string, { price: number; expiry: number }> = new Map();
  private readonly volCache: Map<string, { vol: number; expiry: number }> = new Map();
  private readonly fetchFn: FetchFn;
  private readonly quoteTtlMs: number;
  private readonly volatilityTtlMs: number;
  private readonly minReturns: number;

  constructor(options: YahooOracleOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.quoteTtlMs = options.quoteTtlMs ?? 60_000; // 1 minute
    this.volatilityTtlMs = options.volatilityTtlMs ?? 300_000; // 5 minutes
    this.minReturns = options.minReturns ?? 20;
  }

  async latestPrice(symbol: string): Promise<number | null> {
    const cached = this.quoteCache.get(symbol);
    if (cached && Date.now() < cached.expiry) return cached.price;

    try {
      const result = await this.fetchChart(symbol, "1d");
      const price = result?.meta.regularMarketPrice;
      if (price === undefined) {
        log.warn(`Yahoo returned no price for ${symbol}`);
        return null;
      }
      this.quoteCache.set(symbol, { price, expiry: Date.now() + this.quoteTtlMs });
      log.debug(`Yahoo price for ${symbol}: $${price.toFixed(2)}`);
      return price;
    } catch (err) {
      log.error(`Yahoo price fetch failed for ${symbol}`, { error: describeError(err) });
      return null;
    }
  }

  async annualizedVolatility(symbol: string): Promise<number | null> {
    const cached = this.volCache.get(symbol);
    if (cached && Date.now() < cached.expiry) return cached.vol;

    log.debug(`Calculating historical volatility for ${symbol}`);
    try {
      const result = await this.fetchChart(symbol, "1y");
      const closes = (result?.indicators?.quote[0]?.close ?? []).filter(
        (c): c is number => c !== null && c > 0
      );

      if (closes.length - 1 < this.minReturns) {
        log.warn(`Not enough data for ${symbol} volatility (${closes.length} bars)`);
        return null;
      }

      const vol = annualizedVolatilityFromCloses(closes);
      if (vol === null) return null;

      this.volCache.set(symbol, { vol, expiry: Date.now() + this.volatilityTtlMs });
      log.debug(`Yahoo volatility for ${symbol}: ${(vol * 100).toFixed(1)}%`);
      return vol;
    } catch (err) {
      log.error(`Error calculating volatility for ${symbol}`, { error: describeError(err) });
      return null;
    }
  }

  private async fetchChart(symbol: string, range: "1d" | "1y"): Promise<ChartResult | null> {
    const url = `${YAHOO_BASE}/${encodeURIComponent(toYahooSymbol(symbol))}?interval=1d&range=${range}`;
    const res = await this.fetchFn(url, {
      headers: { "User-Agent": "Mozilla/5.0" },
    });

    if (!res.ok) {
      throw new Error(`HTTP ${res.status}`);
    }

    const json = ChartResponseSchema.parse(await res.json());
    return json.chart.result?.[0] ?? null;
  }
}
