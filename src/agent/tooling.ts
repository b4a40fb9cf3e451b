/**
 * Tool dispatch. Each validated tool call is routed through a closed table
 * keyed by tool name, runs to completion against the conversation state, and
 * leaves a log entry for the planner's next turn. Partial failures become
 * `ToolExecutionWarning`s on the state; they never abort the run.
 */
import { logTools } from "../config/logger.js";
import {
  INDICATOR_IDS,
  MIN_OBSERVATIONS,
  computeIndicators,
} from "../tools/indicators.js";
import { summarizeMetrics } from "../tools/metrics.js";
import {
  closesOf,
  normaliseTickers,
  orderSeries,
  type PriceRow,
  type PriceSource,
} from "../tools/prices.js";
import { describeError } from "./errors.js";
import type { ToolArgs, ToolCall, ToolName } from "./planSchema.js";
import { recordWarning, type ConversationState, type ToolLogEntry } from "./state.js";

export interface ToolContext {
  readonly fetchPrices: PriceSource;
}

interface ToolOutcome {
  readonly ok: boolean;
  readonly detail: string;
}

type ToolExecutor<K extends ToolName> = (
  state: ConversationState,
  args: ToolArgs<K>,
  context: ToolContext,
) => Promise<ToolOutcome>;

async function fetchPrices(
  state: ConversationState,
  args: ToolArgs<"fetch_prices">,
  context: ToolContext,
): Promise<ToolOutcome> {
  const loaded: string[] = [];
  const missing: string[] = [];

  for (const ticker of normaliseTickers(args.tickers)) {
    let rows: PriceRow[] = [];
    let failure: string | null = null;
    try {
      rows = await context.fetchPrices(ticker, args.start, args.end, args.interval);
    } catch (error: unknown) {
      failure = describeError(error);
      logTools.warn({ ticker, err: error }, "Price fetch failed");
    }

    const series = orderSeries(rows);
    // Latest fetch wins; anything derived from the old series is stale.
    state.priceData[ticker] = series;
    state.intervals[ticker] = args.interval;
    delete state.indicators[ticker];
    delete state.metrics[ticker];

    if (series.length === 0) {
      missing.push(ticker);
      recordWarning(state, {
        tool: "fetch_prices",
        ticker,
        message: failure
          ? `price fetch failed (${failure}); no data for ${args.start}..${args.end}`
          : `no price data for ${args.start}..${args.end}`,
      });
    } else {
      loaded.push(`${ticker} (${series.length} rows)`);
    }
  }

  const parts: string[] = [];
  if (loaded.length) parts.push(`fetched ${loaded.join(", ")}`);
  if (missing.length) parts.push(`no data for ${missing.join(", ")}`);
  return { ok: missing.length === 0, detail: parts.join("; ") };
}

async function computeIndicatorsTool(
  state: ConversationState,
  args: ToolArgs<"compute_indicators">,
): Promise<ToolOutcome> {
  const ids = args.indicators ?? INDICATOR_IDS;
  const targets = args.tickers ? normaliseTickers(args.tickers) : Object.keys(state.priceData);
  if (targets.length === 0) {
    recordWarning(state, {
      tool: "compute_indicators",
      message: "no tickers have price data yet; call fetch_prices first",
    });
    return { ok: false, detail: "nothing to compute" };
  }

  const computed: string[] = [];
  let ok = true;
  for (const ticker of targets) {
    const series = state.priceData[ticker];
    if (!series) {
      ok = false;
      recordWarning(state, {
        tool: "compute_indicators",
        ticker,
        message: "skipped: prices were never fetched",
      });
      continue;
    }
    if (series.length === 0) {
      ok = false;
      recordWarning(state, {
        tool: "compute_indicators",
        ticker,
        message: "skipped: price series is empty, indicators unavailable",
      });
      continue;
    }

    state.indicators[ticker] = {
      ...state.indicators[ticker],
      ...computeIndicators(closesOf(series), ids),
    };
    computed.push(ticker);

    for (const id of ids) {
      if (series.length < MIN_OBSERVATIONS[id]) {
        ok = false;
        recordWarning(state, {
          tool: "compute_indicators",
          ticker,
          message: `${id} needs ${MIN_OBSERVATIONS[id]} observations, only ${series.length} available`,
        });
      }
    }
  }

  return {
    ok,
    detail: computed.length
      ? `computed ${ids.join(", ")} for ${computed.join(", ")}`
      : "no indicators computed",
  };
}

async function summarizeMetricsTool(
  state: ConversationState,
  args: ToolArgs<"summarize_metrics">,
): Promise<ToolOutcome> {
  const targets = args.tickers ? normaliseTickers(args.tickers) : Object.keys(state.priceData);
  const summarized: string[] = [];
  let ok = targets.length > 0;

  for (const ticker of targets) {
    const series = state.priceData[ticker];
    if (!series) {
      ok = false;
      recordWarning(state, {
        tool: "summarize_metrics",
        ticker,
        message: "skipped: prices were never fetched",
      });
      continue;
    }

    const indicators = state.indicators[ticker];
    state.metrics[ticker] = summarizeMetrics(
      series,
      indicators,
      state.intervals[ticker] ?? state.parsed.interval,
    );
    summarized.push(ticker);

    if (series.length === 0) {
      ok = false;
    } else if (!indicators) {
      ok = false;
      recordWarning(state, {
        tool: "summarize_metrics",
        ticker,
        message: "indicators not computed; indicator states unknown",
      });
    }
  }

  if (targets.length === 0) {
    recordWarning(state, {
      tool: "summarize_metrics",
      message: "no tickers have price data yet; call fetch_prices first",
    });
  }

  return {
    ok,
    detail: summarized.length ? `summarized ${summarized.join(", ")}` : "nothing to summarize",
  };
}

export const toolExecutors: { [K in ToolName]: ToolExecutor<K> } = {
  fetch_prices: fetchPrices,
  compute_indicators: computeIndicatorsTool,
  summarize_metrics: summarizeMetricsTool,
};

function execute<K extends ToolName>(
  state: ConversationState,
  call: { readonly name: K; readonly args: ToolArgs<K> },
  context: ToolContext,
): Promise<ToolOutcome> {
  const executor: ToolExecutor<K> = toolExecutors[call.name];
  return executor(state, call.args, context);
}

export async function dispatchToolCall(
  state: ConversationState,
  call: ToolCall,
  context: ToolContext,
): Promise<ToolLogEntry> {
  logTools.info({ tool: call.name, args: call.args, iteration: state.iteration }, "Running tool");
  let outcome: ToolOutcome;
  try {
    outcome = await execute(state, call, context);
  } catch (error: unknown) {
    logTools.error({ tool: call.name, err: error }, "Tool raised an unexpected error");
    recordWarning(state, { tool: call.name, message: `tool failed: ${describeError(error)}` });
    outcome = { ok: false, detail: `failed: ${describeError(error)}` };
  }
  const entry: ToolLogEntry = {
    iteration: state.iteration,
    tool: call.name,
    ok: outcome.ok,
    detail: outcome.detail,
  };
  state.toolLog.push(entry);
  return entry;
}

/** Runs calls strictly in the declared order; later calls see earlier results. */
export async function runToolCalls(
  state: ConversationState,
  calls: readonly ToolCall[],
  context: ToolContext,
): Promise<ToolLogEntry[]> {
  const entries: ToolLogEntry[] = [];
  for (const call of calls) {
    entries.push(await dispatchToolCall(state, call, context));
  }
  return entries;
}
