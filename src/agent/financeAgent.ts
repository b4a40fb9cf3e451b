/**
 * Plan → execute → narrate loop for one question.
 *
 *   PLANNING ──valid CALL_TOOLS──▶ EXECUTING ──▶ PLANNING (or FINALIZING at the cap)
 *   PLANNING ──valid FINALIZE────▶ FINALIZING ──▶ DONE
 *   PLANNING ──invalid at the cap▶ ABORTED
 *   FINALIZING ──narrator fails──▶ ABORTED
 *
 * The planner is invoked at most `maxIterations` times, so the loop terminates
 * whatever the planner returns.
 */
import { randomUUID } from "node:crypto";

import {
  MAX_ITER,
  NARRATOR_MODEL,
  PLANNER_MODEL,
} from "../config/constants.js";
import { logAgent } from "../config/logger.js";
import { resolveQuestion, type ParsedIntent } from "../parsing/resolve.js";
import { createYahooPriceSource } from "../tools/yahoo.js";
import type { PriceSource } from "../tools/prices.js";
import type { CompletionModel } from "./chatTypes.js";
import {
  AgentError,
  IterationExhausted,
  NarratorUnavailable,
  PlannerUnavailable,
  RunCancelled,
  SchemaViolation,
  describeError,
  type RunStage,
} from "./errors.js";
import { createOpenRouterModel } from "./openRouterClient.js";
import { parsePlan, planToJson, type Plan, type ToolCall } from "./planSchema.js";
import { buildNarratorMessages, buildPlannerMessages } from "./prompts.js";
import { initialState, type ConversationState } from "./state.js";
import { runToolCalls } from "./tooling.js";

export type LoopState = "PLANNING" | "EXECUTING" | "FINALIZING" | "DONE" | "ABORTED";

export interface FinanceAgentDeps {
  readonly planner: CompletionModel;
  readonly narrator: CompletionModel;
  readonly fetchPrices: PriceSource;
  readonly maxIterations?: number;
}

export interface RunOptions {
  /** Checked before every planner turn; an aborted signal ends the run. */
  readonly signal?: AbortSignal;
}

export interface AskOptions extends RunOptions {
  readonly today?: string;
}

export type RunOutcome =
  | {
      readonly status: "DONE";
      readonly finalAnswer: string;
      readonly state: ConversationState;
      readonly transitions: readonly LoopState[];
    }
  | {
      readonly status: "ABORTED";
      readonly stage: RunStage;
      readonly error: AgentError;
      readonly state: ConversationState;
      readonly transitions: readonly LoopState[];
    };

type PlanStep =
  | { readonly ok: true; readonly plan: Plan }
  | { readonly ok: false; readonly error: SchemaViolation | PlannerUnavailable };

export function createFinanceAgent(deps: FinanceAgentDeps) {
  const maxIterations = deps.maxIterations ?? MAX_ITER;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }

  async function requestPlan(state: ConversationState): Promise<PlanStep> {
    let raw: string;
    try {
      raw = await deps.planner.complete(buildPlannerMessages(state, maxIterations));
    } catch (error: unknown) {
      return {
        ok: false,
        error: new PlannerUnavailable(`Planner call failed: ${describeError(error)}`, {
          cause: error,
        }),
      };
    }
    const result = parsePlan(raw);
    return result.ok ? result : { ok: false, error: result.violation };
  }

  async function run(
    question: string,
    parsed: ParsedIntent,
    options: RunOptions = {},
  ): Promise<RunOutcome> {
    const log = logAgent.child({ runId: randomUUID() });
    const state = initialState(question, parsed);
    const transitions: LoopState[] = [];
    const enter = (next: LoopState): LoopState => {
      transitions.push(next);
      log.debug({ state: next, iteration: state.iteration }, "Loop transition");
      return next;
    };

    let phase = enter("PLANNING");
    let pendingCalls: readonly ToolCall[] = [];
    let failure: AgentError | null = null;

    log.info({ question, parsed }, "Run started");

    while (phase !== "DONE" && phase !== "ABORTED") {
      switch (phase) {
        case "PLANNING": {
          if (options.signal?.aborted) {
            log.info({ iteration: state.iteration }, "Run cancelled");
            throw new RunCancelled({ cause: options.signal.reason });
          }
          state.iteration += 1;
          const step = await requestPlan(state);
          if (step.ok) {
            state.lastFeedback = undefined;
            log.info({ iteration: state.iteration, plan: planToJson(step.plan) }, "Plan accepted");
            pendingCalls = step.plan.tool_calls;
            phase = enter(step.plan.next_action === "FINALIZE" ? "FINALIZING" : "EXECUTING");
            break;
          }

          const { error } = step;
          state.lastFeedback = {
            rule: error instanceof SchemaViolation ? error.rule : "planner_unavailable",
            message: error.message,
          };
          log.warn(
            { iteration: state.iteration, error: error.name, reason: error.message },
            "Plan rejected",
          );
          if (state.iteration >= maxIterations) {
            failure = new AgentError(
              `planner exhausted retries after ${state.iteration} attempts: ${error.message}`,
              "planning",
              { cause: error },
            );
            phase = enter("ABORTED");
          }
          break;
        }

        case "EXECUTING": {
          await runToolCalls(state, pendingCalls, { fetchPrices: deps.fetchPrices });
          pendingCalls = [];
          if (state.iteration >= maxIterations) {
            const exhausted = new IterationExhausted(maxIterations);
            state.notes.push(`${exhausted.message}; answering with the metrics available.`);
            log.warn({ iteration: state.iteration }, exhausted.message);
            phase = enter("FINALIZING");
          } else {
            phase = enter("PLANNING");
          }
          break;
        }

        case "FINALIZING": {
          if (Object.keys(state.metrics).length === 0) {
            state.notes.push("No metrics could be computed for the requested tickers.");
          }
          try {
            const text = (await deps.narrator.complete(buildNarratorMessages(state))).trim();
            if (!text) {
              throw new Error("Narrator returned an empty answer");
            }
            state.finalAnswer = text;
            phase = enter("DONE");
          } catch (error: unknown) {
            failure = new NarratorUnavailable(`Narrator call failed: ${describeError(error)}`, {
              cause: error,
            });
            log.error({ err: error }, "Narration failed");
            phase = enter("ABORTED");
          }
          break;
        }
      }
    }

    if (phase === "DONE" && state.finalAnswer !== undefined) {
      log.info({ iterations: state.iteration }, "Run finished");
      return { status: "DONE", finalAnswer: state.finalAnswer, state, transitions };
    }

    const error = failure ?? new AgentError("Run ended without an answer", "planning");
    return { status: "ABORTED", stage: error.stage, error, state, transitions };
  }

  async function ask(question: string, options: AskOptions = {}): Promise<RunOutcome> {
    const parsed = resolveQuestion(question, { today: options.today });
    return run(question, parsed, options);
  }

  return { run, ask, maxIterations };
}

export type FinanceAgent = ReturnType<typeof createFinanceAgent>;

export function defaultFinanceAgentDeps(): FinanceAgentDeps {
  return {
    planner: createOpenRouterModel({
      model: PLANNER_MODEL,
      temperature: 0,
      maxTokens: 512,
      jsonMode: true,
    }),
    narrator: createOpenRouterModel({
      model: NARRATOR_MODEL,
      temperature: 0.1,
      maxTokens: 512,
    }),
    fetchPrices: createYahooPriceSource(),
  };
}

/** Resolves the question and runs it against OpenRouter and Yahoo Finance. */
export async function generateFinanceAnswer(
  question: string,
  options: AskOptions = {},
): Promise<RunOutcome> {
  return createFinanceAgent(defaultFinanceAgentDeps()).ask(question, options);
}
