/**
 * Windowed technical indicators over an ordered close series.
 *
 * Every function returns an array aligned index-for-index with its input.
 * Warm-up positions are NaN, and NaN anywhere upstream stays NaN downstream;
 * nothing is ever filled with 0 or carried forward.
 */

export const INDICATOR_IDS = ["sma20", "sma50", "ema20", "rsi14", "macd", "bbands"] as const;

export type IndicatorId = (typeof INDICATOR_IDS)[number];

export type SeriesKey =
  | "sma20"
  | "sma50"
  | "ema20"
  | "rsi14"
  | "macd"
  | "macd_signal"
  | "macd_hist"
  | "bb_mid"
  | "bb_upper"
  | "bb_lower";

export type IndicatorSeries = Partial<Record<SeriesKey, number[]>>;

export const INDICATOR_CONFIG = {
  sma: { short: 20, long: 50 },
  ema: { period: 20 },
  rsi: { period: 14 },
  macd: { fast: 12, slow: 26, signal: 9 },
  bollinger: { period: 20, stdDev: 2 },
} as const;

/** Closes needed before the indicator's last value can be defined. */
export const MIN_OBSERVATIONS: Record<IndicatorId, number> = {
  sma20: INDICATOR_CONFIG.sma.short,
  sma50: INDICATOR_CONFIG.sma.long,
  ema20: INDICATOR_CONFIG.ema.period,
  rsi14: INDICATOR_CONFIG.rsi.period + 1,
  macd: INDICATOR_CONFIG.macd.slow + INDICATOR_CONFIG.macd.signal - 1,
  bbands: INDICATOR_CONFIG.bollinger.period,
};

function assertWindow(window: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Indicator window must be a positive integer, got ${window}`);
  }
}

function nanArray(length: number): number[] {
  return new Array<number>(length).fill(Number.NaN);
}

export function sma(values: readonly number[], window: number): number[] {
  assertWindow(window);
  const out = nanArray(values.length);
  for (let i = window - 1; i < values.length; i++) {
    let sum = 0;
    for (let j = i - window + 1; j <= i; j++) {
      sum += values[j];
    }
    out[i] = sum / window;
  }
  return out;
}

/**
 * Exponential moving average with alpha = 2 / (window + 1), seeded by the
 * simple mean of the first `window` values. Leading NaNs (e.g. the warm-up of
 * an upstream indicator) are skipped before seeding.
 */
export function ema(values: readonly number[], window: number): number[] {
  assertWindow(window);
  const out = nanArray(values.length);
  const start = values.findIndex((value) => !Number.isNaN(value));
  if (start < 0 || start + window > values.length) {
    return out;
  }

  let seed = 0;
  for (let i = start; i < start + window; i++) {
    seed += values[i];
  }
  out[start + window - 1] = seed / window;

  const alpha = 2 / (window + 1);
  for (let i = start + window; i < values.length; i++) {
    out[i] = alpha * values[i] + (1 - alpha) * out[i - 1];
  }
  return out;
}

function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (Number.isNaN(avgGain) || Number.isNaN(avgLoss)) {
    return Number.NaN;
  }
  if (avgLoss === 0) {
    // flat window: no gains and no losses
    return avgGain > 0 ? 100 : 50;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/** Wilder RSI. The first `window` points are NaN (it needs `window` changes). */
export function rsi(values: readonly number[], window: number = INDICATOR_CONFIG.rsi.period): number[] {
  assertWindow(window);
  const out = nanArray(values.length);
  if (values.length <= window) {
    return out;
  }

  let gainSum = 0;
  let lossSum = 0;
  for (let i = 1; i <= window; i++) {
    const change = values[i] - values[i - 1];
    gainSum += Math.max(change, 0);
    lossSum += Math.max(-change, 0);
  }

  let avgGain = gainSum / window;
  let avgLoss = lossSum / window;
  out[window] = rsiFromAverages(avgGain, avgLoss);

  for (let i = window + 1; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    avgGain = (avgGain * (window - 1) + Math.max(change, 0)) / window;
    avgLoss = (avgLoss * (window - 1) + Math.max(-change, 0)) / window;
    out[i] = rsiFromAverages(avgGain, avgLoss);
  }
  return out;
}

export interface MacdSeries {
  readonly macd: number[];
  readonly signal: number[];
  readonly histogram: number[];
}

export function macd(
  values: readonly number[],
  fast: number = INDICATOR_CONFIG.macd.fast,
  slow: number = INDICATOR_CONFIG.macd.slow,
  signalWindow: number = INDICATOR_CONFIG.macd.signal,
): MacdSeries {
  const fastEma = ema(values, fast);
  const slowEma = ema(values, slow);
  const line = fastEma.map((value, i) => value - slowEma[i]);
  const signal = ema(line, signalWindow);
  const histogram = line.map((value, i) => value - signal[i]);
  return { macd: line, signal, histogram };
}

export interface BollingerSeries {
  readonly middle: number[];
  readonly upper: number[];
  readonly lower: number[];
}

/** Bands use the population standard deviation of the trailing window. */
export function bollinger(
  values: readonly number[],
  window: number = INDICATOR_CONFIG.bollinger.period,
  stdDev: number = INDICATOR_CONFIG.bollinger.stdDev,
): BollingerSeries {
  const middle = sma(values, window);
  const upper = nanArray(values.length);
  const lower = nanArray(values.length);

  for (let i = window - 1; i < values.length; i++) {
    const mean = middle[i];
    let squared = 0;
    for (let j = i - window + 1; j <= i; j++) {
      squared += (values[j] - mean) ** 2;
    }
    const deviation = Math.sqrt(squared / window);
    upper[i] = mean + stdDev * deviation;
    lower[i] = mean - stdDev * deviation;
  }
  return { middle, upper, lower };
}

export function computeIndicators(
  closes: readonly number[],
  ids: readonly IndicatorId[] = INDICATOR_IDS,
): IndicatorSeries {
  const result: IndicatorSeries = {};
  for (const id of ids) {
    switch (id) {
      case "sma20":
        result.sma20 = sma(closes, INDICATOR_CONFIG.sma.short);
        break;
      case "sma50":
        result.sma50 = sma(closes, INDICATOR_CONFIG.sma.long);
        break;
      case "ema20":
        result.ema20 = ema(closes, INDICATOR_CONFIG.ema.period);
        break;
      case "rsi14":
        result.rsi14 = rsi(closes, INDICATOR_CONFIG.rsi.period);
        break;
      case "macd": {
        const series = macd(closes);
        result.macd = series.macd;
        result.macd_signal = series.signal;
        result.macd_hist = series.histogram;
        break;
      }
      case "bbands": {
        const bands = bollinger(closes);
        result.bb_mid = bands.middle;
        result.bb_upper = bands.upper;
        result.bb_lower = bands.lower;
        break;
      }
      default: {
        const unreachable: never = id;
        throw new Error(`Unsupported indicator: ${String(unreachable)}`);
      }
    }
  }
  return result;
}
