/**
 * Ticker and comparison detection from free text. Deterministic, no model
 * call. Words that look like tickers but are common English or finance jargon
 * are filtered through the stopword list in `data/stopwords.json`.
 */
import { readFileSync } from "node:fs";

import { z } from "zod";

import { stopwordsPath } from "../config/paths.js";

const TICKER_PATTERN = /\$([A-Za-z]{1,5})\b|\b([A-Z]{1,5})\b/g;
const COMPARE_PATTERN = /\b(vs\.?|versus|compare|compared)\b/i;

let stopwords: ReadonlySet<string> | null = null;

function loadStopwords(): ReadonlySet<string> {
  if (!stopwords) {
    const raw: unknown = JSON.parse(readFileSync(stopwordsPath, "utf-8"));
    stopwords = new Set(z.array(z.string()).parse(raw));
  }
  return stopwords;
}

export interface Intent {
  readonly tickers: string[];
  readonly compare: boolean;
}

/**
 * Symbols in order of first appearance: uppercase runs of 1-5 letters, or any
 * `$`-prefixed run (`$aapl`). One- and two-letter symbols only count with the
 * `$` prefix (`$F`, `$GE`).
 */
export function extractTickers(text: string): string[] {
  if (!text) {
    return [];
  }
  const words = loadStopwords();
  const seen = new Set<string>();
  for (const match of text.matchAll(TICKER_PATTERN)) {
    const [, prefixed, bare] = match;
    const ticker = (prefixed ?? bare).toUpperCase();
    if (seen.has(ticker) || words.has(ticker)) {
      continue;
    }
    if (ticker.length <= 2 && prefixed === undefined) {
      continue;
    }
    seen.add(ticker);
  }
  return [...seen];
}

export function detectCompare(text: string, tickers: readonly string[]): boolean {
  return tickers.length >= 2 || COMPARE_PATTERN.test(text);
}

export function parseIntent(question: string): Intent {
  const tickers = extractTickers(question);
  return { tickers, compare: detectCompare(question, tickers) };
}
