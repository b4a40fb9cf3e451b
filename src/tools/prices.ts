/**
 * Price-series types shared by the data source, the dispatcher and the
 * metrics summarizer.
 */
import { MAX_TICKERS_PER_CALL } from "../config/constants.js";

export const INTERVAL_CHOICES = ["1d", "1wk", "1mo"] as const;

export type Interval = (typeof INTERVAL_CHOICES)[number];

/** Trading periods per year, used to annualize volatility. */
export const PERIODS_PER_YEAR: Record<Interval, number> = {
  "1d": 252,
  "1wk": 52,
  "1mo": 12,
};

export interface PriceRow {
  /** Trading date, `YYYY-MM-DD` (UTC). */
  readonly date: string;
  readonly open: number | null;
  readonly high: number | null;
  readonly low: number | null;
  readonly close: number;
  readonly volume: number | null;
}

/** Rows ordered by strictly increasing date. */
export type PriceSeries = readonly PriceRow[];

export type PriceSource = (
  ticker: string,
  start: string,
  end: string,
  interval: Interval,
) => Promise<PriceRow[]>;

/** Uppercases, de-duplicates (first occurrence wins) and caps the list. */
export function normaliseTickers(
  tickers: readonly string[],
  limit: number = MAX_TICKERS_PER_CALL,
): string[] {
  const seen = new Set<string>();
  for (const raw of tickers) {
    const ticker = raw.trim().replace(/^\$/, "").toUpperCase();
    if (ticker) {
      seen.add(ticker);
    }
  }
  return [...seen].slice(0, limit);
}

/**
 * Sorts rows by date and keeps the last row seen for a repeated date, so the
 * result satisfies the strictly-increasing index invariant.
 */
export function orderSeries(rows: readonly PriceRow[]): PriceRow[] {
  const byDate = new Map<string, PriceRow>();
  for (const row of rows) {
    byDate.set(row.date, row);
  }
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function closesOf(series: PriceSeries): number[] {
  return series.map((row) => row.close);
}
