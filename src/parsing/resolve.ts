import { UnresolvedIntent } from "../agent/errors.js";
import type { Interval } from "../tools/prices.js";
import { parseIntent } from "./intent.js";
import { resolveTimeframe } from "./timeframes.js";

/** Deterministic reading of a question, fixed before the loop starts. */
export interface ParsedIntent {
  readonly tickers: readonly string[];
  readonly start: string;
  readonly end: string;
  readonly interval: Interval;
  readonly compare: boolean;
}

export interface ResolveOptions {
  /** Anchor for relative phrases, `YYYY-MM-DD`. Defaults to the current UTC date. */
  readonly today?: string;
}

export function resolveQuestion(question: string, options: ResolveOptions = {}): ParsedIntent {
  const text = question.trim();
  if (!text) {
    throw new UnresolvedIntent("The question is empty.");
  }

  const { tickers, compare } = parseIntent(text);
  if (tickers.length === 0) {
    throw new UnresolvedIntent(
      `No ticker symbol found in "${text}". Mention one in capitals (AAPL) or with a $ prefix ($aapl).`,
    );
  }

  const { start, end, interval } = resolveTimeframe(text, options.today);
  return { tickers, start, end, interval, compare };
}
