/**
 * Failure taxonomy for a single question run. Every class names the stage it
 * belongs to so the CLI can report "<stage> failed" without inspecting types.
 */
export type RunStage = "resolution" | "planning" | "narration";

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly stage: RunStage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AgentError";
  }
}

export class UnresolvedIntent extends AgentError {
  constructor(message: string) {
    super(message, "resolution");
    this.name = "UnresolvedIntent";
  }
}

export type SchemaViolationRule =
  | "malformed_syntax"
  | "invalid_shape"
  | "unknown_next_action"
  | "finalize_with_tool_calls"
  | "call_tools_without_tool_calls"
  | "unknown_tool"
  | "invalid_arguments";

export class SchemaViolation extends AgentError {
  constructor(
    public readonly rule: SchemaViolationRule,
    message: string,
  ) {
    super(message, "planning");
    this.name = "SchemaViolation";
  }
}

export class PlannerUnavailable extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "planning", options);
    this.name = "PlannerUnavailable";
  }
}

/** Recorded, never thrown: hitting the cap forces finalization. */
export class IterationExhausted extends AgentError {
  constructor(public readonly iterations: number) {
    super(`Iteration cap of ${iterations} reached without a FINALIZE plan`, "planning");
    this.name = "IterationExhausted";
  }
}

export class NarratorUnavailable extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "narration", options);
    this.name = "NarratorUnavailable";
  }
}

export class RunCancelled extends AgentError {
  constructor(options?: { cause?: unknown }) {
    super("Run was cancelled before the next planning step", "planning", options);
    this.name = "RunCancelled";
  }
}

export interface ToolExecutionWarning {
  readonly tool: string;
  readonly ticker?: string;
  readonly message: string;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
