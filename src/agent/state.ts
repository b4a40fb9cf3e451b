/**
 * The record threaded through one question's run. The loop owns it
 * exclusively; tools mutate it in place and it is dropped with the outcome.
 */
import type { ParsedIntent } from "../parsing/resolve.js";
import type { IndicatorSeries } from "../tools/indicators.js";
import type { MetricsSummary } from "../tools/metrics.js";
import type { Interval, PriceSeries } from "../tools/prices.js";
import type { SchemaViolationRule, ToolExecutionWarning } from "./errors.js";
import type { ToolName } from "./planSchema.js";

export interface ToolLogEntry {
  readonly iteration: number;
  readonly tool: ToolName;
  readonly ok: boolean;
  readonly detail: string;
}

export interface PlannerFeedback {
  readonly rule: SchemaViolationRule | "planner_unavailable";
  readonly message: string;
}

export interface ConversationState {
  readonly question: string;
  readonly parsed: ParsedIntent;
  iteration: number;
  priceData: Record<string, PriceSeries>;
  /** Interval each ticker's series was fetched at. */
  intervals: Record<string, Interval>;
  indicators: Record<string, IndicatorSeries>;
  metrics: Record<string, MetricsSummary>;
  toolLog: ToolLogEntry[];
  warnings: ToolExecutionWarning[];
  /** Why the previous planner turn was rejected, shown on the next turn. */
  lastFeedback?: PlannerFeedback;
  /** Run-level remarks (e.g. the iteration cap) passed to the narrator. */
  notes: string[];
  finalAnswer?: string;
}

export function initialState(question: string, parsed: ParsedIntent): ConversationState {
  return {
    question,
    parsed,
    iteration: 0,
    priceData: {},
    intervals: {},
    indicators: {},
    metrics: {},
    toolLog: [],
    warnings: [],
    notes: [],
  };
}

export function recordWarning(state: ConversationState, warning: ToolExecutionWarning): void {
  state.warnings.push(warning);
}

/** Data limitations in plain text, safe to hand to either model. */
export function dataNotes(state: ConversationState): string[] {
  const warnings = state.warnings.map((warning) =>
    warning.ticker ? `${warning.ticker}: ${warning.message}` : warning.message,
  );
  return [...new Set([...warnings, ...state.notes])];
}
