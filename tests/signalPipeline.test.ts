import { describe, expect, it, vi } from "vitest";

import { loadRuleTableOrThrow } from "../src/rules/ruleTableLoader.js";
import { PriceProvider } from "../src/runtime/priceProvider.js";
import { SignalPipeline, type PipelineOutput } from "../src/runtime/signalPipeline.js";
import type { Logger } from "../src/telemetry/logger.js";
import { FIXED_DATE, fixedClock, fixtureRuleSource, fixtureRuleTable } from "./fixtures/ruleFixtures.js";

function createRecordingLogger() {
  return {
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  } satisfies Logger;
}

function createPipeline(logger: Logger = createRecordingLogger()): SignalPipeline {
  return new SignalPipeline({
    rules: fixtureRuleTable(),
    formatter: { template: "compact" },
    logger,
    clock: fixedClock,
  });
}

function processOk(pipeline: SignalPipeline, text: string, price?: number): PipelineOutput {
  const result = pipeline.process(text, { price });
  if (!result.ok) {
    throw new Error(`expected "${text}" to process, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

describe("PriceProvider", () => {
  const provider = new PriceProvider(() => fixtureRuleTable());

  it("prefers the message price, then the caller's, then the reference", () => {
    expect(provider.resolve("BTCUSD", 64000, 1)).toEqual({ ok: true, value: { price: 64000, source: "message" } });
    expect(provider.resolve("BTCUSD", undefined, 64500)).toEqual({
      ok: true,
      value: { price: 64500, source: "caller" },
    });
    expect(provider.resolve("BTCUSD")).toEqual({ ok: true, value: { price: 65000, source: "reference" } });
  });

  it("skips unusable prices", () => {
    expect(provider.resolve("BTCUSD", 0, Number.NaN)).toEqual({
      ok: true,
      value: { price: 65000, source: "reference" },
    });
  });

  it("fails when nothing provides a price", () => {
    const result = provider.resolve("ETHUSDT");

    expect(!result.ok && result.error.kind).toBe("PriceUnavailable");
    expect(!result.ok && result.error.message).toBe("No price available for ETHUSDT");
  });
});

describe("SignalPipeline", () => {
  it("falls back to the reference price", () => {
    const { record, formatted } = processOk(createPipeline(), "LONG BTC M5");

    expect(record.priceSource).toBe("reference");
    expect(record.levels.entry).toBe(65000);
    expect(record.generatedAt).toBe(FIXED_DATE);
    expect(formatted.text).toContain("Entry: `65000.00`");
  });

  it("uses the message price over the caller's", () => {
    const { record } = processOk(createPipeline(), "LONG BTC M5 @64000", 1);

    expect(record.priceSource).toBe("message");
    expect(record.levels.entry).toBe(64000);
  });

  it("uses the caller's price when the message has none", () => {
    const { record, formatted } = processOk(createPipeline(), "SHORT ETH H1", 2500);

    expect(record.priceSource).toBe("caller");
    expect(record.levels.tp1).toBeCloseTo(2450, 8);
    expect(record.levels.sl).toBeCloseTo(2575, 8);
    expect(formatted.webhookPayload.action).toBe("short");
  });

  it("rejects signals without any price", () => {
    const result = createPipeline().process("SHORT ETH H1");

    expect(!result.ok && result.error.kind).toBe("PriceUnavailable");
  });

  it("formats with the asset's configured precision", () => {
    const { formatted } = processOk(createPipeline(), "LONG EUR M15 @1.085");

    expect(formatted.text).toContain("Entry: `1.08500`");
  });

  it("counts processed signals and rejections", () => {
    const logger = createRecordingLogger();
    const pipeline = createPipeline(logger);

    expect(pipeline.getStats()).toEqual({ signalsProcessed: 0, errors: 0, lastSignalAt: undefined });

    processOk(pipeline, "LONG BTC M5");
    processOk(pipeline, "SELL GOLD M1");
    const rejected = pipeline.process("LONG BTC M99");

    expect(!rejected.ok && rejected.error.kind).toBe("UnsupportedTimeframe");
    expect(pipeline.getStats()).toEqual({
      signalsProcessed: 2,
      errors: 1,
      lastSignalAt: "2024-01-15T09:30:05.000Z",
    });
    expect(logger.warn).toHaveBeenCalledWith(
      "signal rejected",
      expect.objectContaining({ kind: "UnsupportedTimeframe", text: "LONG BTC M99" }),
    );
    expect(logger.info).toHaveBeenCalledWith(
      "signal generated",
      expect.objectContaining({ asset: "XAUUSD", priceSource: "reference" }),
    );
  });

  it("parses and calculates without touching the counters", () => {
    const pipeline = createPipeline();

    expect(pipeline.parse("BUY ETH H1").ok).toBe(true);
    expect(pipeline.calculate({ direction: "LONG", asset: "US30", timeframe: "H1", entryPrice: 39500 }).ok).toBe(
      true,
    );
    expect(pipeline.getStats().signalsProcessed).toBe(0);
  });

  it("serves the replacement table after a reload", () => {
    const logger = createRecordingLogger();
    const pipeline = createPipeline(logger);
    const source = fixtureRuleSource();
    delete source.assets.XAUUSD;

    expect(pipeline.process("SHORT GOLD M1").ok).toBe(true);
    pipeline.replaceRules(loadRuleTableOrThrow(source));

    const result = pipeline.process("SHORT GOLD M1");
    expect(!result.ok && result.error.kind).toBe("NoAsset");
    expect(pipeline.getRules().assets.size).toBe(7);
    expect(logger.info).toHaveBeenCalledWith("rule table replaced", { assets: 7 });
  });

  it("renders structured alerts with the asset's precision", () => {
    const logger = createRecordingLogger();
    const result = createPipeline(logger).processAlert({ action: "buy", ticker: "EUR", close: 1.085, interval: "15" });

    expect(result.ok && result.value.alert).toMatchObject({ symbol: "EURUSD", timeframe: "M15" });
    expect(result.ok && result.value.text.split("\n")[3]).toBe("💵 Entry: `1.08500`");
    expect(result.ok && result.value.plainText.split("\n")[0]).toBe("🟢 LONG EURUSD");
    expect(logger.info).toHaveBeenCalledWith("alert formatted", {
      direction: "LONG",
      symbol: "EURUSD",
      timeframe: "M15",
    });
  });

  it("logs rejected alerts without touching the counters", () => {
    const logger = createRecordingLogger();
    const pipeline = createPipeline(logger);
    const result = pipeline.processAlert({ ticker: "BTCUSD", close: 65000 });

    expect(!result.ok && result.error.issues).toEqual(["action is required"]);
    expect(logger.warn).toHaveBeenCalledWith("alert rejected", { issues: ["action is required"] });
    expect(pipeline.getStats()).toMatchObject({ signalsProcessed: 0, errors: 0 });
  });

  it("lists configured assets", () => {
    const assets = createPipeline().listAssets();

    expect(assets).toHaveLength(8);
    expect(assets[0]).toEqual({
      symbol: "BTCUSD",
      aliases: ["BTC", "BITCOIN"],
      timeframes: ["M1", "M5", "H1"],
      referencePrice: 65000,
    });
    expect(assets.find((asset) => asset.symbol === "FLATUSD")?.aliases).toEqual([]);
  });
});
