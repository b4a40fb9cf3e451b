/**
 * Strict contract for planner output. Raw completion text is parsed and
 * checked rule by rule; the first broken rule is reported as a
 * `SchemaViolation` carrying that rule, so the loop can re-prompt with a
 * precise hint.
 */
import { z } from "zod";

import { MAX_TICKERS_PER_CALL } from "../config/constants.js";
import { parseIsoDate } from "../parsing/timeframes.js";
import { INDICATOR_IDS } from "../tools/indicators.js";
import { INTERVAL_CHOICES } from "../tools/prices.js";
import { SchemaViolation } from "./errors.js";

export const NEXT_ACTIONS = ["CALL_TOOLS", "FINALIZE"] as const;
export type NextAction = (typeof NEXT_ACTIONS)[number];

export const TOOL_NAMES = ["fetch_prices", "compute_indicators", "summarize_metrics"] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const isoDateSchema = z
  .string()
  .regex(ISO_DATE, "must be a YYYY-MM-DD date")
  .refine((value) => parseIsoDate(value) !== null, "must be a real calendar date");

const tickerListSchema = z.array(z.string().trim().min(1)).min(1).max(MAX_TICKERS_PER_CALL);

export const fetchPricesArgsSchema = z
  .object({
    tickers: tickerListSchema,
    start: isoDateSchema,
    end: isoDateSchema,
    interval: z.enum(INTERVAL_CHOICES),
  })
  .strict()
  .refine((args) => args.start <= args.end, {
    message: "start must not be after end",
    path: ["start"],
  });

export const computeIndicatorsArgsSchema = z
  .object({
    indicators: z.array(z.enum(INDICATOR_IDS)).min(1).optional(),
    tickers: tickerListSchema.optional(),
  })
  .strict();

export const summarizeMetricsArgsSchema = z
  .object({
    tickers: tickerListSchema.optional(),
  })
  .strict();

export const TOOL_ARG_SCHEMAS = {
  fetch_prices: fetchPricesArgsSchema,
  compute_indicators: computeIndicatorsArgsSchema,
  summarize_metrics: summarizeMetricsArgsSchema,
} satisfies Record<ToolName, z.ZodTypeAny>;

export type ToolArgs<T extends ToolName> = z.infer<(typeof TOOL_ARG_SCHEMAS)[T]>;

export type ToolCall = { [K in ToolName]: { readonly name: K; readonly args: ToolArgs<K> } }[ToolName];

export interface Plan {
  readonly next_action: NextAction;
  readonly tool_calls: readonly ToolCall[];
}

export type PlanValidationResult =
  | { readonly ok: true; readonly plan: Plan }
  | { readonly ok: false; readonly violation: SchemaViolation };

type ToolCallParse =
  | { readonly ok: true; readonly call: ToolCall }
  | { readonly ok: false; readonly message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNextAction(value: unknown): value is NextAction {
  return NEXT_ACTIONS.some((action) => action === value);
}

export function isToolName(value: unknown): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function parseToolCall(name: ToolName, args: unknown): ToolCallParse {
  switch (name) {
    case "fetch_prices": {
      const parsed = fetchPricesArgsSchema.safeParse(args);
      return parsed.success
        ? { ok: true, call: { name, args: parsed.data } }
        : { ok: false, message: formatIssues(parsed.error) };
    }
    case "compute_indicators": {
      const parsed = computeIndicatorsArgsSchema.safeParse(args);
      return parsed.success
        ? { ok: true, call: { name, args: parsed.data } }
        : { ok: false, message: formatIssues(parsed.error) };
    }
    case "summarize_metrics": {
      const parsed = summarizeMetricsArgsSchema.safeParse(args);
      return parsed.success
        ? { ok: true, call: { name, args: parsed.data } }
        : { ok: false, message: formatIssues(parsed.error) };
    }
  }
}

/** Models like to wrap JSON in a Markdown fence; a single outer fence is tolerated. */
export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

function reject(rule: SchemaViolation["rule"], message: string): PlanValidationResult {
  return { ok: false, violation: new SchemaViolation(rule, message) };
}

export function validatePlan(candidate: unknown): PlanValidationResult {
  if (!isRecord(candidate)) {
    return reject("invalid_shape", "Plan must be a JSON object");
  }

  const nextAction = candidate.next_action;
  if (!isNextAction(nextAction)) {
    return reject(
      "unknown_next_action",
      nextAction === undefined
        ? "Missing required field 'next_action'"
        : `next_action must be CALL_TOOLS or FINALIZE, got ${JSON.stringify(nextAction)}`,
    );
  }

  const rawCalls = candidate.tool_calls ?? [];
  if (!Array.isArray(rawCalls)) {
    return reject("invalid_shape", "tool_calls must be an array");
  }
  if (nextAction === "FINALIZE" && rawCalls.length > 0) {
    return reject("finalize_with_tool_calls", "tool_calls must be empty when next_action is FINALIZE");
  }
  if (nextAction === "CALL_TOOLS" && rawCalls.length === 0) {
    return reject(
      "call_tools_without_tool_calls",
      "tool_calls cannot be empty when next_action is CALL_TOOLS",
    );
  }

  const toolCalls: ToolCall[] = [];
  for (const [index, rawCall] of rawCalls.entries()) {
    if (!isRecord(rawCall) || !("name" in rawCall)) {
      return reject("invalid_shape", `tool_calls[${index}] must be an object with a 'name'`);
    }
    const { name } = rawCall;
    if (!isToolName(name)) {
      return reject(
        "unknown_tool",
        `tool_calls[${index}]: unknown tool ${JSON.stringify(name)}; expected one of ${TOOL_NAMES.join(", ")}`,
      );
    }
    const parsed = parseToolCall(name, rawCall.args ?? {});
    if (!parsed.ok) {
      return reject("invalid_arguments", `tool_calls[${index}] (${name}): ${parsed.message}`);
    }
    toolCalls.push(parsed.call);
  }

  return { ok: true, plan: { next_action: nextAction, tool_calls: toolCalls } };
}

export function parsePlan(raw: string): PlanValidationResult {
  let candidate: unknown;
  try {
    candidate = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return reject("malformed_syntax", `Planner output is not valid JSON: ${reason}`);
  }
  return validatePlan(candidate);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(value[key])]),
    );
  }
  return value;
}

export function planToJson(plan: Plan): string {
  return JSON.stringify(sortKeys(plan));
}
