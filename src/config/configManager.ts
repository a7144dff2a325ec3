import path from "node:path";
import { fileURLToPath } from "node:url";

import { DEFAULT_SIGNATURE, isTemplateName, type TemplateName } from "../formatting/signalFormatter.js";
import type { LogLevel } from "../telemetry/logger.js";

export interface SignalServiceConfig {
  readonly rulesPath: string;
  readonly port: number;
  readonly template: TemplateName;
  readonly signature: string;
  readonly webhookSecret?: string;
  readonly logLevel: LogLevel;
}

export interface ConfigProvider {
  getConfig(): SignalServiceConfig;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_RULES_PATH = path.resolve(__dirname, "../../config/rules.json");
const DEFAULT_PORT = 3000;
const DEFAULT_TEMPLATE: TemplateName = "standard";

function parsePort(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 && parsed < 65_536 ? parsed : fallback;
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class ConfigManager implements ConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getConfig(): SignalServiceConfig {
    const rulesPath = readString(this.env.SIGNAL_RULES_PATH);
    const template = readString(this.env.SIGNAL_TEMPLATE)?.toLowerCase();

    return {
      rulesPath: rulesPath ? path.resolve(rulesPath) : DEFAULT_RULES_PATH,
      port: parsePort(this.env.PORT, DEFAULT_PORT),
      template: template && isTemplateName(template) ? template : DEFAULT_TEMPLATE,
      signature: readString(this.env.SIGNAL_SIGNATURE) ?? DEFAULT_SIGNATURE,
      webhookSecret: readString(this.env.SIGNAL_WEBHOOK_SECRET),
      logLevel: readString(this.env.SIGNAL_LOG_LEVEL)?.toLowerCase() === "silent" ? "silent" : "info",
    };
  }
}

export const defaultConfigManager = new ConfigManager();

export function getConfig(): SignalServiceConfig {
  return defaultConfigManager.getConfig();
}
