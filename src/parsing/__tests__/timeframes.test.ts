import { describe, it, expect } from "vitest";
import { inferInterval, parseIsoDate, resolveTimeframe, shiftBack } from "../timeframes.js";

const TODAY = "2025-08-15";

describe("timeframes", () => {
  describe("resolveTimeframe", () => {
    it.each([
      ["last 3 months", "2025-05-15"],
      ["over the past 10 days", "2025-08-05"],
      ["past week", "2025-08-08"],
      ["in the last year", "2024-08-15"],
      ["YTD", "2025-01-01"],
      ["year to date", "2025-01-01"],
      ["3m", "2025-05-15"],
      ["1w", "2025-08-08"],
    ])("should read %s relative to today", (text, start) => {
      expect(resolveTimeframe(`How did AAPL do ${text}?`, TODAY)).toEqual({
        start,
        end: TODAY,
        interval: "1d",
      });
    });

    it("should read an absolute range", () => {
      expect(resolveTimeframe("AAPL from 2024-01-15 to 2024-07-01", TODAY)).toEqual({
        start: "2024-01-15",
        end: "2024-07-01",
        interval: "1d",
      });
    });

    it("should run an open range up to today", () => {
      expect(resolveTimeframe("AAPL since 2025-03-01", TODAY)).toEqual({
        start: "2025-03-01",
        end: TODAY,
        interval: "1d",
      });
    });

    it("should default to the last six months", () => {
      expect(resolveTimeframe("How is AAPL?", TODAY)).toEqual({
        start: "2025-02-15",
        end: TODAY,
        interval: "1d",
      });
    });

    it("should swap a reversed range", () => {
      const frame = resolveTimeframe("from 2025-03-01 to 2025-01-01", TODAY);
      expect([frame.start, frame.end]).toEqual(["2025-01-01", "2025-03-01"]);
    });

    it("should clamp future dates to today", () => {
      const frame = resolveTimeframe("from 2025-08-01 to 2025-12-31", TODAY);
      expect([frame.start, frame.end]).toEqual(["2025-08-01", TODAY]);
    });

    it("should widen the interval for long windows", () => {
      expect(resolveTimeframe("past 2 years", TODAY).interval).toBe("1wk");
      expect(resolveTimeframe("5y", TODAY)).toEqual({
        start: "2020-08-15",
        end: TODAY,
        interval: "1mo",
      });
    });
  });

  describe("helpers", () => {
    it("should clamp month arithmetic to the end of the month", () => {
      const start = shiftBack(new Date("2025-05-31T00:00:00Z"), { months: 3 });
      expect(start.toISOString().slice(0, 10)).toBe("2025-02-28");
    });

    it("should reject dates that are not on the calendar", () => {
      expect(parseIsoDate("2025-02-30")).toBeNull();
      expect(parseIsoDate("20250201")).toBeNull();
      expect(parseIsoDate("2024-02-29")?.toISOString()).toBe("2024-02-29T00:00:00.000Z");
    });

    it("should pick the interval from the window length", () => {
      const end = new Date("2025-08-15T00:00:00Z");
      expect(inferInterval(new Date("2023-08-16T00:00:00Z"), end)).toBe("1d");
      expect(inferInterval(new Date("2023-08-15T00:00:00Z"), end)).toBe("1wk");
    });
  });
});
