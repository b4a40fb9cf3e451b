export {
  createFinanceAgent,
  defaultFinanceAgentDeps,
  generateFinanceAnswer,
  type AskOptions,
  type FinanceAgent,
  type FinanceAgentDeps,
  type LoopState,
  type RunOptions,
  type RunOutcome,
} from "./agent/financeAgent.js";
export type { ChatMessage, CompletionModel } from "./agent/chatTypes.js";
export {
  AgentError,
  IterationExhausted,
  NarratorUnavailable,
  PlannerUnavailable,
  RunCancelled,
  SchemaViolation,
  UnresolvedIntent,
  type RunStage,
  type SchemaViolationRule,
  type ToolExecutionWarning,
} from "./agent/errors.js";
export { createOpenRouterModel, type OpenRouterModelOptions } from "./agent/openRouterClient.js";
export { parsePlan, validatePlan, planToJson, type Plan, type ToolCall } from "./agent/planSchema.js";
export { initialState, type ConversationState } from "./agent/state.js";
export { dispatchToolCall, runToolCalls } from "./agent/tooling.js";
export { resolveQuestion, type ParsedIntent } from "./parsing/resolve.js";
export {
  bollinger,
  computeIndicators,
  ema,
  macd,
  rsi,
  sma,
  type IndicatorId,
  type IndicatorSeries,
} from "./tools/indicators.js";
export { summarizeMetrics, UNAVAILABLE, type MetricsSummary } from "./tools/metrics.js";
export type { Interval, PriceRow, PriceSource } from "./tools/prices.js";
export { createYahooPriceSource } from "./tools/yahoo.js";
