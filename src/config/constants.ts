/**
 * Runtime settings read from the environment (and `.env`, via dotenv). Values
 * are validated once at import so a bad `.env` fails fast with a readable
 * message instead of surfacing later as a NaN timeout.
 */
import "dotenv/config.js";

import { z } from "zod";

export const OPENROUTER_API_KEY_ENV = "OPENROUTER_API_KEY";

/** Upper bound on planner invocations for one question. */
export const MAX_ITER = 3;

export const MAX_TICKERS_PER_CALL = 5;

const envSchema = z.object({
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  PLANNER_MODEL: z.string().min(1).default("meta-llama/llama-3.1-8b-instruct"),
  NARRATOR_MODEL: z.string().min(1).default("meta-llama/llama-3.1-8b-instruct"),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PRICE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type RuntimeEnv = z.infer<typeof envSchema>;

export function loadRuntimeEnv(source: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

const runtimeEnv = loadRuntimeEnv();

export const OPENROUTER_BASE_URL = runtimeEnv.OPENROUTER_BASE_URL;
export const PLANNER_MODEL = runtimeEnv.PLANNER_MODEL;
export const NARRATOR_MODEL = runtimeEnv.NARRATOR_MODEL;
export const MODEL_TIMEOUT_MS = runtimeEnv.MODEL_TIMEOUT_MS;
export const PRICE_FETCH_TIMEOUT_MS = runtimeEnv.PRICE_FETCH_TIMEOUT_MS;
export const LOG_LEVEL = runtimeEnv.LOG_LEVEL;

export function requireOpenRouterApiKey(source: NodeJS.ProcessEnv = process.env): string {
  const apiKey = source[OPENROUTER_API_KEY_ENV];
  if (!apiKey) {
    throw new Error(
      `Environment variable ${OPENROUTER_API_KEY_ENV} must be set to call the planner or narrator.`,
    );
  }
  return apiKey;
}
