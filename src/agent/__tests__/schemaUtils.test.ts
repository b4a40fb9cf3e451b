import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  computeIndicatorsArgsSchema,
  fetchPricesArgsSchema,
  summarizeMetricsArgsSchema,
} from "../planSchema.js";
import { schemaToOpenAPI, zodToJson } from "../schemaUtils.js";

const tickerList = {
  type: "array",
  items: { type: "string", minLength: 1 },
  minItems: 1,
  maxItems: 5,
};

describe("zodToJson", () => {
  it("should describe the fetch_prices arguments", () => {
    const isoDate = { type: "string", pattern: "^\\d{4}-\\d{2}-\\d{2}$" };
    expect(zodToJson(fetchPricesArgsSchema)).toEqual({
      type: "object",
      properties: {
        tickers: tickerList,
        start: isoDate,
        end: isoDate,
        interval: { type: "string", enum: ["1d", "1wk", "1mo"] },
      },
      required: ["tickers", "start", "end", "interval"],
      additionalProperties: false,
    });
  });

  it("should leave optional fields out of required", () => {
    expect(zodToJson(summarizeMetricsArgsSchema)).toEqual({
      type: "object",
      properties: { tickers: tickerList },
      additionalProperties: false,
    });
  });

  it("should list enum items for compute_indicators", () => {
    expect(zodToJson(computeIndicatorsArgsSchema)).toEqual({
      type: "object",
      properties: {
        indicators: {
          type: "array",
          items: {
            type: "string",
            enum: ["sma20", "sma50", "ema20", "rsi14", "macd", "bbands"],
          },
          minItems: 1,
        },
        tickers: tickerList,
      },
      additionalProperties: false,
    });
  });

  it("should describe unsupported schema kinds as an empty schema", () => {
    expect(schemaToOpenAPI(z.number())).toEqual({});
  });
});
