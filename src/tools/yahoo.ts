/**
 * Yahoo Finance price source. Wraps `yahoo-finance2`'s chart endpoint with a
 * timeout and a small retry budget, and normalises the quotes into
 * `PriceRow`s (end date inclusive, null closes dropped, dates de-duplicated).
 */
import YahooFinance from "yahoo-finance2";

import { PRICE_FETCH_TIMEOUT_MS } from "../config/constants.js";
import { logTools } from "../config/logger.js";
import { orderSeries, type Interval, type PriceRow, type PriceSource } from "./prices.js";

const DAY_MS = 86_400_000;

export interface ChartQuote {
  readonly date: Date;
  readonly open?: number | null;
  readonly high?: number | null;
  readonly low?: number | null;
  readonly close?: number | null;
  readonly volume?: number | null;
}

/** The slice of the yahoo-finance2 client this module relies on. */
export interface ChartClient {
  chart(
    symbol: string,
    options: { period1: Date; period2: Date; interval: Interval },
  ): Promise<{ quotes: readonly ChartQuote[] }>;
}

export interface YahooPriceSourceOptions {
  readonly client?: ChartClient;
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly retryDelayMs?: number;
}

let defaultClient: ChartClient | null = null;

function getDefaultClient(): ChartClient {
  if (!defaultClient) {
    const yf = new YahooFinance({ suppressNotices: ["yahooSurvey"] });
    defaultClient = {
      chart: async (symbol, options) => {
        const result = await yf.chart(symbol, options);
        return { quotes: result.quotes };
      },
    };
  }
  return defaultClient;
}

async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Yahoo request timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function isClientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return /not found|invalid|no data/i.test(message);
}

function toIsoDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function quotesToRows(quotes: readonly ChartQuote[]): PriceRow[] {
  const rows: PriceRow[] = [];
  for (const quote of quotes) {
    const close = finiteOrNull(quote.close);
    if (close === null) {
      continue;
    }
    rows.push({
      date: toIsoDate(quote.date),
      open: finiteOrNull(quote.open),
      high: finiteOrNull(quote.high),
      low: finiteOrNull(quote.low),
      close,
      volume: finiteOrNull(quote.volume),
    });
  }
  return orderSeries(rows);
}

export function createYahooPriceSource(options: YahooPriceSourceOptions = {}): PriceSource {
  const {
    timeoutMs = PRICE_FETCH_TIMEOUT_MS,
    retries = 2,
    retryDelayMs = 500,
  } = options;

  return async (ticker, start, end, interval) => {
    const client = options.client ?? getDefaultClient();
    const period1 = new Date(`${start}T00:00:00Z`);
    // Yahoo treats period2 as exclusive
    const period2 = new Date(new Date(`${end}T00:00:00Z`).getTime() + DAY_MS);

    let lastError: unknown;
    for (let attempt = 0; attempt <= retries; attempt++) {
      try {
        const chart = await withTimeout(
          client.chart(ticker, { period1, period2, interval }),
          timeoutMs,
        );
        const rows = quotesToRows(chart.quotes);
        logTools.debug({ ticker, start, end, interval, rows: rows.length }, "Fetched price history");
        return rows;
      } catch (error: unknown) {
        lastError = error;
        if (isClientError(error)) {
          break;
        }
        if (attempt < retries) {
          logTools.warn({ ticker, attempt, err: error }, "Yahoo chart request failed, retrying");
          await new Promise((resolve) => setTimeout(resolve, (attempt + 1) * retryDelayMs));
        }
      }
    }
    throw new Error(`Failed to fetch ${ticker} prices from Yahoo Finance`, { cause: lastError });
  };
}
