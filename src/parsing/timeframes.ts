/**
 * Deterministic timeframe parsing (no model call).
 *
 * Recognised, first match wins:
 *   1. absolute ranges: "from 2024-01-15 to 2024-07-01", "since 2024-01-15"
 *   2. "YTD" / "year to date"
 *   3. "last 3 months", "past 2 years", "past week"
 *   4. compact tokens: 1d 5d 1w 1m 3m 6m 9m 1y 2y 5y
 *   5. otherwise the last 6 months
 *
 * Dates are clamped to `today` and swapped when reversed. The interval is
 * chosen from the window length: over 5 years monthly, over 2 years weekly,
 * daily otherwise.
 */
import type { Interval } from "../tools/prices.js";

export interface Timeframe {
  readonly start: string;
  readonly end: string;
  readonly interval: Interval;
}

interface Offset {
  readonly days?: number;
  readonly weeks?: number;
  readonly months?: number;
  readonly years?: number;
}

const DAY_MS = 86_400_000;

const FROM_TO_RE = /\b(?:from\s+)?(\d{4}-\d{2}-\d{2})\s*(?:to|-|–)\s*(\d{4}-\d{2}-\d{2})\b/i;
const SINCE_RE = /\b(?:since|from)\s+(\d{4}-\d{2}-\d{2})\b/i;
const YTD_RE = /\b(ytd|year\s*to\s*date)\b/i;
const RELATIVE_RE = /\b(?:last|past)\s+(\d{1,3})\s*(days?|weeks?|months?|years?)\b/i;
const SINGLE_UNIT_RE = /\b(?:last|past)\s*(day|week|month|year)\b/i;
const COMPACT_RE = /\b(1d|5d|1w|1m|3m|6m|9m|1y|2y|5y)\b/i;

const DEFAULT_LOOKBACK: Offset = { months: 6 };

export function parseIsoDate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return null;
  }
  const date = new Date(`${value}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || formatIsoDate(date) !== value) {
    return null;
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function utcMidnight(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Subtracts a calendar offset; month arithmetic clamps to the month's last day. */
export function shiftBack(date: Date, offset: Offset): Date {
  const totalMonths = (offset.years ?? 0) * 12 + (offset.months ?? 0);
  let result = date;
  if (totalMonths) {
    const target = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() - totalMonths, 1));
    const lastDay = new Date(
      Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0),
    ).getUTCDate();
    target.setUTCDate(Math.min(date.getUTCDate(), lastDay));
    result = target;
  }
  const days = (offset.weeks ?? 0) * 7 + (offset.days ?? 0);
  return new Date(result.getTime() - days * DAY_MS);
}

function unitOffset(unit: string, amount: number): Offset {
  const normalised = unit.toLowerCase();
  if (normalised.startsWith("d")) return { days: amount };
  if (normalised.startsWith("w")) return { weeks: amount };
  if (normalised.startsWith("m")) return { months: amount };
  return { years: amount };
}

type DateSpan = { start: Date; end: Date };

function parseAbsolute(text: string, today: Date): DateSpan | null {
  const range = FROM_TO_RE.exec(text);
  if (range) {
    const start = parseIsoDate(range[1]);
    const end = parseIsoDate(range[2]);
    if (start && end) {
      return { start, end };
    }
  }
  const since = SINCE_RE.exec(text);
  if (since) {
    const start = parseIsoDate(since[1]);
    if (start) {
      return { start, end: today };
    }
  }
  return null;
}

function parseYtd(text: string, today: Date): DateSpan | null {
  if (!YTD_RE.test(text)) {
    return null;
  }
  return { start: new Date(Date.UTC(today.getUTCFullYear(), 0, 1)), end: today };
}

function parseRelative(text: string, today: Date): DateSpan | null {
  const relative = RELATIVE_RE.exec(text);
  if (relative) {
    return { start: shiftBack(today, unitOffset(relative[2], Number(relative[1]))), end: today };
  }
  const single = SINGLE_UNIT_RE.exec(text);
  if (single) {
    return { start: shiftBack(today, unitOffset(single[1], 1)), end: today };
  }
  return null;
}

function parseCompact(text: string, today: Date): DateSpan | null {
  const compact = COMPACT_RE.exec(text);
  if (!compact) {
    return null;
  }
  const token = compact[1].toLowerCase();
  const amount = Number(token.slice(0, -1));
  const unit = token.slice(-1);
  return { start: shiftBack(today, unitOffset(unit, amount)), end: today };
}

export function inferInterval(start: Date, end: Date): Interval {
  const days = Math.round((end.getTime() - start.getTime()) / DAY_MS);
  if (days > 365 * 5) return "1mo";
  if (days > 365 * 2) return "1wk";
  return "1d";
}

function resolveToday(today: string | Date | undefined): Date {
  if (today instanceof Date) {
    return utcMidnight(today);
  }
  if (typeof today === "string") {
    const parsed = parseIsoDate(today);
    if (parsed) {
      return parsed;
    }
  }
  return utcMidnight(new Date());
}

export function resolveTimeframe(text: string, today?: string | Date): Timeframe {
  const anchor = resolveToday(today);
  const span =
    parseAbsolute(text, anchor) ??
    parseYtd(text, anchor) ??
    parseRelative(text, anchor) ??
    parseCompact(text, anchor) ?? { start: shiftBack(anchor, DEFAULT_LOOKBACK), end: anchor };

  let start = span.start > anchor ? anchor : span.start;
  let end = span.end > anchor ? anchor : span.end;
  if (start > end) {
    [start, end] = [end, start];
  }

  return {
    start: formatIsoDate(start),
    end: formatIsoDate(end),
    interval: inferInterval(start, end),
  };
}
