import { vi } from "vitest";
import type { ParsedIntent } from "../../parsing/resolve.js";
import type { PriceRow, PriceSource } from "../../tools/prices.js";
import type { ChatMessage, CompletionModel } from "../chatTypes.js";

export const PARSED: ParsedIntent = {
  tickers: ["AAPL"],
  start: "2025-01-01",
  end: "2025-06-30",
  interval: "1d",
  compare: false,
};

/** `count` daily rows from 2025-01-01 with a gentle oscillating uptrend */
export function makeRows(count: number, base = 100): PriceRow[] {
  return Array.from({ length: count }, (_, i) => {
    const close = base + Math.sin(i / 4) * 2 + i * 0.25;
    return {
      date: new Date(Date.UTC(2025, 0, 1 + i)).toISOString().slice(0, 10),
      open: close - 0.5,
      high: close + 1,
      low: close - 1,
      close,
      volume: 1_000 + i,
    };
  });
}

/** Price source serving fixed rows per ticker; unknown tickers get an empty series */
export function fakeSource(rowsByTicker: Record<string, PriceRow[]>) {
  return vi.fn<PriceSource>(async (ticker) => rowsByTicker[ticker] ?? []);
}

/** Completion model replaying scripted replies; a string starting with "!" throws */
export function scriptedModel(replies: readonly string[]) {
  const calls: ChatMessage[][] = [];
  let index = 0;
  const model: CompletionModel = {
    complete: async (messages) => {
      calls.push([...messages]);
      const reply = replies[Math.min(index, replies.length - 1)] ?? "";
      index += 1;
      if (reply.startsWith("!")) {
        throw new Error(reply.slice(1));
      }
      return reply;
    },
  };
  return { model, calls };
}

export function fetchPlan(tickers: readonly string[], interval = "1d"): string {
  return JSON.stringify({
    next_action: "CALL_TOOLS",
    tool_calls: [
      { name: "fetch_prices", args: { tickers, start: "2025-01-01", end: "2025-06-30", interval } },
      { name: "compute_indicators", args: {} },
      { name: "summarize_metrics", args: {} },
    ],
  });
}

export const FINALIZE_PLAN = JSON.stringify({ next_action: "FINALIZE", tool_calls: [] });
