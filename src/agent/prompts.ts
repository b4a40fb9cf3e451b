/**
 * Prompt text for the planner and narrator, and the builders that turn the
 * conversation state into chat messages. Only counts, keys and summary records
 * leave the process; price and indicator series never do.
 */
import { MAX_ITER, MAX_TICKERS_PER_CALL } from "../config/constants.js";
import { INDICATOR_IDS } from "../tools/indicators.js";
import { INTERVAL_CHOICES } from "../tools/prices.js";
import type { ChatMessage } from "./chatTypes.js";
import { TOOL_ARG_SCHEMAS, TOOL_NAMES } from "./planSchema.js";
import { zodToJson } from "./schemaUtils.js";
import { dataNotes, type ConversationState } from "./state.js";

export const systemPrompt = [
  "You are a financial analysis explainer. You use tools to fetch market data and compute technical indicators, then explain the findings.",
  "Report concrete numbers and ISO dates. Be concise and factual.",
  "Do not give investment advice or predict future performance; describe historical behaviour only.",
].join(" ");

const TOOL_DESCRIPTIONS: Record<(typeof TOOL_NAMES)[number], string> = {
  fetch_prices: "Download OHLCV price history for up to five tickers over an explicit date window.",
  compute_indicators:
    "Compute technical indicators on already fetched prices (all fetched tickers unless `tickers` is given).",
  summarize_metrics:
    "Reduce prices and indicators to returns, volatility, drawdown, trend and indicator states.",
};

function toolCatalogue(): string {
  return TOOL_NAMES.map(
    (name) =>
      `- ${name}: ${TOOL_DESCRIPTIONS[name]} Arguments schema: ${JSON.stringify(zodToJson(TOOL_ARG_SCHEMAS[name]))}`,
  ).join("\n");
}

export function plannerPrompt(maxTurns: number = MAX_ITER): string {
  return [
    "You are the Planner. Read the question, the parsed window and any metrics already computed, and reply with a plan as strict JSON.",
    'The plan is an object: {"next_action": "CALL_TOOLS" | "FINALIZE", "tool_calls": [{"name": ..., "args": {...}}]}.',
    "tool_calls must be non-empty for CALL_TOOLS and empty for FINALIZE. Tool calls run in order.",
    "",
    "Tools:",
    toolCatalogue(),
    "",
    `Allowed intervals: ${INTERVAL_CHOICES.join(", ")}. Allowed indicators: ${INDICATOR_IDS.join(", ")}. At most ${MAX_TICKERS_PER_CALL} tickers per call.`,
    `You have at most ${maxTurns} turns in total.`,
    "",
    "Strategy:",
    "- If prices are missing, call fetch_prices with the parsed tickers and window.",
    '- Then compute_indicators (for example ["sma20", "rsi14", "macd", "bbands"]) and finish with summarize_metrics.',
    "- If metrics exist for every ticker you can answer with, choose FINALIZE.",
    "- If a ticker returned no data, do not fetch it again.",
    "",
    'Example: {"next_action": "CALL_TOOLS", "tool_calls": [{"name": "fetch_prices", "args": {"tickers": ["AAPL"], "start": "2024-01-01", "end": "2024-03-31", "interval": "1d"}}, {"name": "compute_indicators", "args": {"indicators": ["sma20", "rsi14", "macd"]}}, {"name": "summarize_metrics", "args": {}}]}',
    "",
    "Output JSON only: no prose, no Markdown.",
  ].join("\n");
}

export function narratorPrompt(): string {
  return [
    "You are the Explainer. Using only the metrics provided, write a 4-7 sentence explanation.",
    "Include the time window with its start and end dates, the period return as a percentage, the trend direction, one or two indicator readings (RSI, MACD state or Bollinger position), and volatility with maximum drawdown.",
    "For several tickers, call out the relative performance.",
    'Values marked "unavailable" or states marked "unknown" could not be computed; say so briefly if they matter, along with any data notes.',
    "No investment recommendations and no forecasts.",
  ].join("\n");
}

export function plannerContext(state: ConversationState, maxTurns: number = MAX_ITER) {
  const fetched = Object.fromEntries(
    Object.entries(state.priceData).map(([ticker, series]) => [ticker, series.length]),
  );
  const indicators = Object.fromEntries(
    Object.entries(state.indicators).map(([ticker, series]) => [ticker, Object.keys(series).sort()]),
  );
  return {
    question: state.question,
    parsed: state.parsed,
    turn: state.iteration,
    max_turns: maxTurns,
    rows_fetched: fetched,
    indicators_computed: indicators,
    metrics: state.metrics,
    tool_log: state.toolLog,
    data_notes: dataNotes(state),
    ...(state.lastFeedback ? { previous_error: state.lastFeedback } : {}),
  };
}

export function narratorContext(state: ConversationState) {
  return {
    question: state.question,
    parsed: state.parsed,
    metrics: state.metrics,
    data_notes: dataNotes(state),
  };
}

export function buildPlannerMessages(
  state: ConversationState,
  maxTurns: number = MAX_ITER,
): ChatMessage[] {
  return [
    { role: "system", content: `${systemPrompt}\n\n${plannerPrompt(maxTurns)}` },
    { role: "user", content: JSON.stringify(plannerContext(state, maxTurns), null, 2) },
  ];
}

export function buildNarratorMessages(state: ConversationState): ChatMessage[] {
  return [
    { role: "system", content: systemPrompt },
    {
      role: "user",
      content: `${narratorPrompt()}\n\nJSON: ${JSON.stringify(narratorContext(state), null, 2)}`,
    },
  ];
}
