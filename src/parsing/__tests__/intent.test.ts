import { describe, it, expect } from "vitest";
import { UnresolvedIntent } from "../../agent/errors.js";
import { extractTickers, parseIntent } from "../intent.js";
import { resolveQuestion } from "../resolve.js";

describe("intent", () => {
  describe("extractTickers", () => {
    it("should pick uppercase symbols in order of appearance", () => {
      expect(extractTickers("Compare AAPL vs MSFT over the last 6 months")).toEqual(["AAPL", "MSFT"]);
    });

    it("should skip jargon and common words written in capitals", () => {
      expect(extractTickers("WHAT IS THE RSI OF NVDA")).toEqual(["NVDA"]);
      expect(extractTickers("How has TSLA done YTD?")).toEqual(["TSLA"]);
    });

    it("should accept $-prefixed symbols in any case", () => {
      expect(extractTickers("$f and $ge vs $tsla")).toEqual(["F", "GE", "TSLA"]);
    });

    it("should ignore bare one- and two-letter capitals", () => {
      expect(extractTickers("Is GE up? I wonder")).toEqual([]);
    });

    it("should de-duplicate across spellings", () => {
      expect(extractTickers("AAPL and $aapl")).toEqual(["AAPL"]);
    });

    it("should not match words longer than five letters", () => {
      expect(extractTickers("GOOGLE is not a symbol")).toEqual([]);
    });
  });

  describe("parseIntent", () => {
    it("should flag comparisons by ticker count", () => {
      expect(parseIntent("AAPL and MSFT this year")).toEqual({ tickers: ["AAPL", "MSFT"], compare: true });
    });

    it("should flag comparisons by wording", () => {
      expect(parseIntent("AAPL versus the market").compare).toBe(true);
      expect(parseIntent("How did AAPL do?").compare).toBe(false);
    });
  });

  describe("resolveQuestion", () => {
    it("should combine tickers, window and interval", () => {
      expect(
        resolveQuestion("Compare AAPL and MSFT over the past 2 years", { today: "2025-08-15" }),
      ).toEqual({
        tickers: ["AAPL", "MSFT"],
        start: "2023-08-15",
        end: "2025-08-15",
        interval: "1wk",
        compare: true,
      });
    });

    it("should reject an empty question", () => {
      expect(() => resolveQuestion("   ")).toThrow(new UnresolvedIntent("The question is empty."));
    });

    it("should reject a question without a ticker", () => {
      expect(() => resolveQuestion("how is the market?")).toThrow(
        'No ticker symbol found in "how is the market?". Mention one in capitals (AAPL) or with a $ prefix ($aapl).',
      );
    });
  });
});
