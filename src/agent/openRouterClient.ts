/**
 * OpenRouter chat-completions client exposed as a `CompletionModel`. Each
 * request carries its own timeout; failures reject with an `Error` whose
 * `cause` holds the underlying fetch or HTTP problem.
 */
import {
  MODEL_TIMEOUT_MS,
  OPENROUTER_BASE_URL,
  requireOpenRouterApiKey,
} from "../config/constants.js";
import { logModel } from "../config/logger.js";
import type { ChatMessage, CompletionModel, OpenRouterResponsePayload } from "./chatTypes.js";
import { messageText } from "./openRouterUtils.js";

export interface OpenRouterModelOptions {
  readonly model: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly jsonMode?: boolean;
  readonly apiKey?: string;
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
}

export function createOpenRouterModel(options: OpenRouterModelOptions): CompletionModel {
  const {
    model,
    temperature = 0,
    maxTokens,
    jsonMode = false,
    baseUrl = OPENROUTER_BASE_URL,
    timeoutMs = MODEL_TIMEOUT_MS,
  } = options;

  return {
    async complete(messages: readonly ChatMessage[]): Promise<string> {
      const apiKey = options.apiKey ?? requireOpenRouterApiKey();
      const started = Date.now();

      let response: Response;
      try {
        response = await fetch(`${baseUrl}/chat/completions`, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({
            model,
            messages,
            temperature,
            ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
            ...(jsonMode ? { response_format: { type: "json_object" } } : {}),
          }),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        throw new Error(`OpenRouter request to ${model} failed`, { cause: error });
      }

      if (!response.ok) {
        const text = await response.text();
        throw new Error(
          `OpenRouter request failed (${response.status} ${response.statusText}): ${text}`,
        );
      }

      const payload = (await response.json()) as OpenRouterResponsePayload;
      const choice = payload.choices?.[0];
      if (!choice) {
        throw new Error(
          `No choices returned from OpenRouter${payload.error?.message ? `: ${payload.error.message}` : "."}`,
        );
      }

      const content = messageText(choice.message?.content);
      logModel.debug(
        { model, durationMs: Date.now() - started, chars: content.length },
        "Completion received",
      );
      return content;
    },
  };
}
