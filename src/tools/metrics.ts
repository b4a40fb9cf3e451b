/**
 * Reduces a price series and its indicator series to the compact numeric
 * digest the narrator sees. Short or empty input degrades individual fields to
 * "unavailable" / "unknown"; nothing here throws on lack of history.
 */
import type { IndicatorSeries } from "./indicators.js";
import { PERIODS_PER_YEAR, closesOf, type Interval, type PriceSeries } from "./prices.js";

export const UNAVAILABLE = "unavailable" as const;

export type Unavailable = typeof UNAVAILABLE;
export type MetricValue = number | Unavailable;

export type RsiState = "overbought" | "oversold" | "neutral" | "unknown";
export type MacdState = "bullish" | "bearish" | "neutral" | "unknown";
export type BollingerState = "above_upper" | "below_lower" | "inside" | "unknown";

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

export interface MetricsSummary {
  readonly period_start: string | Unavailable;
  readonly period_end: string | Unavailable;
  readonly observations: number;
  readonly last_close: MetricValue;
  readonly period_return: MetricValue;
  readonly annualized_volatility: MetricValue;
  readonly max_drawdown: MetricValue;
  readonly trend_slope: MetricValue;
  readonly rsi_last: MetricValue;
  readonly rsi_state: RsiState;
  readonly macd_state: MacdState;
  readonly bb_state: BollingerState;
}

function available(value: number): MetricValue {
  return Number.isFinite(value) ? value : UNAVAILABLE;
}

export function periodReturn(closes: readonly number[]): MetricValue {
  if (closes.length < 2) {
    return UNAVAILABLE;
  }
  return available(closes[closes.length - 1] / closes[0] - 1);
}

/** Sample standard deviation of log returns, scaled by √(periods per year). */
export function annualizedVolatility(closes: readonly number[], interval: Interval): MetricValue {
  if (closes.length < 3) {
    return UNAVAILABLE;
  }
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    returns.push(Math.log(closes[i] / closes[i - 1]));
  }
  const mean = returns.reduce((sum, value) => sum + value, 0) / returns.length;
  const variance =
    returns.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (returns.length - 1);
  return available(Math.sqrt(variance) * Math.sqrt(PERIODS_PER_YEAR[interval]));
}

export function maxDrawdown(closes: readonly number[]): MetricValue {
  if (closes.length === 0) {
    return UNAVAILABLE;
  }
  let peak = closes[0];
  let worst = 0;
  for (const close of closes) {
    if (close > peak) {
      peak = close;
    }
    const drawdown = close / peak - 1;
    if (drawdown < worst) {
      worst = drawdown;
    }
  }
  return available(worst);
}

/** OLS slope of close against position; a direction hint, not a forecast. */
export function trendSlope(closes: readonly number[]): MetricValue {
  const n = closes.length;
  if (n < 2) {
    return UNAVAILABLE;
  }
  const meanX = (n - 1) / 2;
  const meanY = closes.reduce((sum, value) => sum + value, 0) / n;
  let covariance = 0;
  let varianceX = 0;
  for (let i = 0; i < n; i++) {
    covariance += (i - meanX) * (closes[i] - meanY);
    varianceX += (i - meanX) ** 2;
  }
  return available(covariance / varianceX);
}

/** Last value of an indicator, provided it is aligned with the price series. */
function tail(series: readonly number[] | undefined, length: number, offset = 0): number {
  if (!series || series.length !== length || length - 1 - offset < 0) {
    return Number.NaN;
  }
  return series[length - 1 - offset];
}

export function classifyRsi(last: number): RsiState {
  if (!Number.isFinite(last)) return "unknown";
  if (last >= RSI_OVERBOUGHT) return "overbought";
  if (last <= RSI_OVERSOLD) return "oversold";
  return "neutral";
}

export function classifyMacd(previousHist: number, lastHist: number): MacdState {
  if (!Number.isFinite(previousHist) || !Number.isFinite(lastHist)) return "unknown";
  if (lastHist > 0 && lastHist > previousHist) return "bullish";
  if (lastHist < 0 && lastHist < previousHist) return "bearish";
  return "neutral";
}

export function classifyBollinger(close: number, upper: number, lower: number): BollingerState {
  if (!Number.isFinite(close) || !Number.isFinite(upper) || !Number.isFinite(lower)) {
    return "unknown";
  }
  if (close > upper) return "above_upper";
  if (close < lower) return "below_lower";
  return "inside";
}

export function summarizeMetrics(
  series: PriceSeries,
  indicators: IndicatorSeries | undefined,
  interval: Interval,
): MetricsSummary {
  const closes = closesOf(series);
  const n = closes.length;
  const lastClose = n > 0 ? closes[n - 1] : Number.NaN;
  const rsiLast = tail(indicators?.rsi14, n);

  return {
    period_start: n > 0 ? series[0].date : UNAVAILABLE,
    period_end: n > 0 ? series[n - 1].date : UNAVAILABLE,
    observations: n,
    last_close: available(lastClose),
    period_return: periodReturn(closes),
    annualized_volatility: annualizedVolatility(closes, interval),
    max_drawdown: maxDrawdown(closes),
    trend_slope: trendSlope(closes),
    rsi_last: available(rsiLast),
    rsi_state: classifyRsi(rsiLast),
    macd_state: classifyMacd(tail(indicators?.macd_hist, n, 1), tail(indicators?.macd_hist, n)),
    bb_state: classifyBollinger(
      lastClose,
      tail(indicators?.bb_upper, n),
      tail(indicators?.bb_lower, n),
    ),
  };
}
