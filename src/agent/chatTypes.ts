/**
 * Chat transcript types exchanged with OpenRouter, and the capability the
 * agent loop depends on instead of a concrete HTTP client.
 */
export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export type OpenRouterResponsePayload = {
  id?: string;
  model?: string;
  choices?: Array<{
    message?: {
      content?: unknown;
    };
  }>;
  error?: { message?: string };
};

/** Text in, text out. Implementations reject on network failure or timeout. */
export interface CompletionModel {
  complete(messages: readonly ChatMessage[]): Promise<string>;
}
