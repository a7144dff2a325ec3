import { describe, expect, it } from "vitest";

import {
  AlertPayloadError,
  normalizeAlertPayload,
  readNumericField,
  SAMPLE_ALERT,
  type TradingViewAlert,
} from "../src/trading/alertPayload.js";
import { fixedClock, fixtureRuleTable } from "./fixtures/ruleFixtures.js";

const rules = fixtureRuleTable();

function normalizeOk(data: unknown): TradingViewAlert {
  const result = normalizeAlertPayload(data, { clock: fixedClock, rules });
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function normalizeIssues(data: unknown): readonly string[] {
  const result = normalizeAlertPayload(data, { clock: fixedClock, rules });
  if (result.ok) {
    throw new Error("expected the alert to be rejected");
  }
  expect(result.error).toBeInstanceOf(AlertPayloadError);
  return result.error.issues;
}

describe("normalizeAlertPayload", () => {
  it("reads the sample alert", () => {
    expect(normalizeOk(SAMPLE_ALERT)).toEqual({
      direction: "LONG",
      action: "buy",
      symbol: "BTCUSD",
      price: 65000,
      timeframe: "M5",
      tp1: 65650,
      tp2: 66300,
      tp3: 67275,
      sl: 64025,
      timestamp: "2024-01-15T09:30:05.000Z",
    });
  });

  it("falls back to the strategy action, symbol, price and timeframe keys", () => {
    const alert = normalizeOk({
      "strategy.order.action": "sell",
      symbol: "eth",
      price: "2450.5",
      timeframe: "h1",
      comment: "  range top ",
      time: "2024-01-15T10:00:00Z",
    });

    expect(alert).toEqual({
      direction: "SHORT",
      action: "sell",
      symbol: "ETHUSDT",
      price: 2450.5,
      timeframe: "H1",
      comment: "range top",
      timestamp: "2024-01-15T10:00:00Z",
    });
  });

  it("defaults the timeframe and keeps unknown symbols as sent", () => {
    const alert = normalizeOk({ action: "LONG", ticker: "solusd", close: 150 });

    expect(alert).toMatchObject({ direction: "LONG", symbol: "SOLUSD", timeframe: "M5" });
  });

  it("keeps raw values when no rule table is given", () => {
    const result = normalizeAlertPayload({ action: "buy", ticker: "gold", close: 2350, interval: 15 }, { clock: fixedClock });

    expect(result.ok && result.value).toMatchObject({ symbol: "GOLD", timeframe: "15" });
  });

  it("collects every problem", () => {
    expect(normalizeIssues({ action: "hold", close: true, tp1: "soon", sl: 64000 })).toEqual([
      'action "hold" must be one of buy, sell, long, short',
      "ticker or symbol is required",
      "close must be a positive number",
      "tp1 must be a number",
    ]);
  });

  it("requires an action and a price", () => {
    expect(normalizeIssues({ ticker: "BTCUSD" })).toEqual(["action is required", "close or price is required"]);
    expect(normalizeIssues({ action: "buy", ticker: "BTCUSD", close: -1 })).toEqual([
      "close must be a positive number",
    ]);
  });

  it("rejects payloads that are not objects", () => {
    expect(normalizeIssues("LONG BTC M5")).toEqual(["alert payload must be a JSON object"]);
    expect(normalizeIssues([SAMPLE_ALERT])).toEqual(["alert payload must be a JSON object"]);
  });
});

describe("readNumericField", () => {
  it("accepts numbers and numeric strings", () => {
    expect(readNumericField(2500)).toBe(2500);
    expect(readNumericField(" 2500.5 ")).toBe(2500.5);
  });

  it("treats absent and blank values as missing", () => {
    expect(readNumericField(undefined)).toBeUndefined();
    expect(readNumericField(null)).toBeUndefined();
    expect(readNumericField("  ")).toBeUndefined();
  });

  it.each([true, false, "abc", Number.NaN, Number.POSITIVE_INFINITY, [1], { value: 1 }])(
    "rejects %s",
    (value) => {
      expect(readNumericField(value)).toBeNull();
    },
  );
});
