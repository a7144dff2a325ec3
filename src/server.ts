import crypto from "node:crypto";

import express, { type Request, type Response } from "express";

import { getConfig } from "./config/configManager.js";
import { DIRECTIONS, type Direction } from "./rules/ruleTypes.js";
import { initSignalPipeline } from "./runtime/serviceRegistry.js";
import type { SignalPipeline } from "./runtime/signalPipeline.js";
import { readNumericField, SAMPLE_ALERT } from "./trading/alertPayload.js";
import { serializeSignalRecord } from "./trading/signalAssembler.js";
import type { SignalError } from "./trading/signalErrors.js";
import { createLogger, SilentLogger, type Logger } from "./telemetry/logger.js";

export interface AppOptions {
  readonly pipeline: SignalPipeline;
  readonly webhookSecret?: string;
  readonly template?: string;
  readonly logger?: Logger;
}

function sendSignalError(res: Response, error: SignalError): void {
  res.status(422).json({ error: error.message, kind: error.kind, details: error.details });
}

function readText(body: unknown, key: string, { acceptRaw = false }: { acceptRaw?: boolean } = {}): string {
  if (typeof body === "string") {
    return acceptRaw ? body.trim() : "";
  }
  if (typeof body === "object" && body !== null) {
    const value: unknown = Reflect.get(body, key);
    return typeof value === "string" ? value.trim() : "";
  }
  return "";
}

function readOptionalNumber(body: unknown, key: string): number | undefined | null {
  if (typeof body !== "object" || body === null) {
    return undefined;
  }
  return readNumericField(Reflect.get(body, key));
}

function readSecret(req: Request): string {
  return readText(req.body, "secret") || (req.get("x-webhook-secret") ?? "");
}

function secretsMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function parseDirection(value: string): Direction | undefined {
  const upper = value.toUpperCase();
  return DIRECTIONS.find((direction) => direction === upper);
}

export function createApp(options: AppOptions): express.Express {
  const { pipeline, webhookSecret } = options;
  const logger = options.logger ?? new SilentLogger();
  const app = express();

  app.use(express.json());
  app.use(express.text({ type: "text/plain" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      assets: pipeline.getRules().assets.size,
      template: options.template ?? "standard",
      webhookSecretConfigured: webhookSecret !== undefined,
    });
  });

  app.get("/api/assets", (_req: Request, res: Response) => {
    res.json({ items: pipeline.listAssets() });
  });

  app.get("/api/stats", (_req: Request, res: Response) => {
    res.json(pipeline.getStats());
  });

  app.post("/api/parse", (req: Request, res: Response) => {
    const text = readText(req.body, "text", { acceptRaw: true });
    if (!text) {
      res.status(400).json({ error: "Signal text is required" });
      return;
    }
    const result = pipeline.parse(text);
    if (!result.ok) {
      sendSignalError(res, result.error);
      return;
    }
    res.json({ signal: result.value });
  });

  app.post("/api/levels", (req: Request, res: Response) => {
    const direction = parseDirection(readText(req.body, "direction"));
    const asset = readText(req.body, "asset").toUpperCase();
    const timeframe = readText(req.body, "timeframe").toUpperCase();
    const entryPrice = readOptionalNumber(req.body, "entryPrice");
    if (!direction || !asset || !timeframe || entryPrice === undefined || entryPrice === null) {
      res.status(400).json({ error: "direction, asset, timeframe and entryPrice are required" });
      return;
    }
    const result = pipeline.calculate({ direction, asset, timeframe, entryPrice });
    if (!result.ok) {
      sendSignalError(res, result.error);
      return;
    }
    res.json({ levels: result.value });
  });

  app.post("/api/signals", (req: Request, res: Response) => {
    const text = readText(req.body, "text");
    if (!text) {
      res.status(400).json({ error: "Signal text is required" });
      return;
    }
    const price = readOptionalNumber(req.body, "price");
    if (price === null) {
      res.status(400).json({ error: "price must be a number" });
      return;
    }
    const result = pipeline.process(text, { price });
    if (!result.ok) {
      sendSignalError(res, result.error);
      return;
    }
    res.json({
      signal: serializeSignalRecord(result.value.record),
      text: result.value.formatted.text,
      plainText: result.value.formatted.plainText,
      webhookPayload: result.value.formatted.webhookPayload,
    });
  });

  app.post("/webhook", (req: Request, res: Response) => {
    if (webhookSecret !== undefined && !secretsMatch(webhookSecret, readSecret(req))) {
      logger.warn("alert rejected: invalid secret");
      res.status(401).json({ error: "Invalid secret" });
      return;
    }
    const result = pipeline.processAlert(req.body);
    if (!result.ok) {
      res.status(400).json({ error: result.error.message, issues: result.error.issues });
      return;
    }
    logger.info("alert received", { symbol: result.value.alert.symbol });
    res.json({
      status: "success",
      alert: result.value.alert,
      text: result.value.text,
      plainText: result.value.plainText,
    });
  });

  app.get("/test", (_req: Request, res: Response) => {
    const result = pipeline.processAlert(SAMPLE_ALERT);
    if (!result.ok) {
      res.status(500).json({ error: result.error.message });
      return;
    }
    res.json({ samplePayload: SAMPLE_ALERT, formattedMessage: result.value.text });
  });

  app.post("/webhook/raw", (req: Request, res: Response) => {
    const message = readText(req.body, "message", { acceptRaw: true });
    if (webhookSecret !== undefined && !secretsMatch(webhookSecret, readSecret(req))) {
      logger.warn("webhook rejected: invalid secret");
      res.status(401).json({ error: "Invalid secret" });
      return;
    }
    if (!message) {
      res.status(400).json({ error: "Signal text is required" });
      return;
    }
    logger.info("webhook message received", { message });
    const result = pipeline.process(message);
    if (!result.ok) {
      sendSignalError(res, result.error);
      return;
    }
    res.json({ status: "success", signal: result.value.formatted.jsonDocument });
  });

  return app;
}

async function startServer(): Promise<void> {
  const config = getConfig();
  const logger = createLogger("server", config.logLevel);
  const pipeline = await initSignalPipeline(config);
  const app = createApp({
    pipeline,
    webhookSecret: config.webhookSecret,
    template: config.template,
    logger,
  });
  app.listen(config.port, () => {
    logger.info(`listening on http://localhost:${config.port}`);
  });
}

if (!process.env.VITEST_WORKER_ID) {
  startServer().catch((error) => {
    console.error("[server] fatal error:", error);
    process.exitCode = 1;
  });
}
