import type { Direction, RuleTable } from "../rules/ruleTypes.js";
import { err, ok, type Result } from "./result.js";

/** Structured alert as charting platforms post it, with its fallbacks resolved. */
export interface TradingViewAlert {
  readonly direction: Direction;
  readonly action: string;
  readonly symbol: string;
  readonly price: number;
  readonly timeframe: string;
  readonly tp1?: number;
  readonly tp2?: number;
  readonly tp3?: number;
  readonly sl?: number;
  readonly comment?: string;
  readonly timestamp: string;
}

export interface AlertNormalizeOptions {
  readonly clock?: () => Date;
  /** When given, known aliases resolve to the canonical symbol and timeframe. */
  readonly rules?: RuleTable;
}

export class AlertPayloadError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid alert payload: ${issues.join("; ")}`);
    this.name = "AlertPayloadError";
    this.issues = issues;
  }
}

export const DEFAULT_ALERT_TIMEFRAME = "M5";

export const SAMPLE_ALERT = {
  action: "buy",
  ticker: "BTCUSD",
  close: 65000,
  interval: "5",
  tp1: 65650,
  tp2: 66300,
  tp3: 67275,
  sl: 64025,
} as const;

const ACTION_DIRECTIONS: Readonly<Record<string, Direction>> = {
  buy: "LONG",
  long: "LONG",
  sell: "SHORT",
  short: "SHORT",
};

const OPTIONAL_LEVELS = ["tp1", "tp2", "tp3", "sl"] as const;

/**
 * Reads a JSON number or a numeric string. `undefined` means the field is
 * absent or blank; `null` means it is present but not a finite number.
 */
export function readNumericField(value: unknown): number | undefined | null {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return undefined;
    }
    const numeric = Number(trimmed);
    return Number.isFinite(numeric) ? numeric : null;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstPresent(data: Record<string, unknown>, keys: readonly string[]): [string, unknown] | undefined {
  for (const key of keys) {
    const value = data[key];
    if (value !== undefined && value !== null && value !== "") {
      return [key, value];
    }
  }
  return undefined;
}

function readLabel(value: unknown): string {
  if (typeof value === "string") {
    return value.trim();
  }
  return typeof value === "number" && Number.isFinite(value) ? String(value) : "";
}

export function normalizeAlertPayload(
  data: unknown,
  options: AlertNormalizeOptions = {},
): Result<TradingViewAlert, AlertPayloadError> {
  if (!isRecord(data)) {
    return err(new AlertPayloadError(["alert payload must be a JSON object"]));
  }
  const issues: string[] = [];
  const { rules } = options;

  const action = readLabel(firstPresent(data, ["action", "strategy.order.action"])?.[1]);
  const direction = ACTION_DIRECTIONS[action.toLowerCase()];
  if (!action) {
    issues.push("action is required");
  } else if (!direction) {
    issues.push(`action "${action}" must be one of buy, sell, long, short`);
  }

  const rawSymbol = readLabel(firstPresent(data, ["ticker", "symbol"])?.[1]).toUpperCase();
  if (!rawSymbol) {
    issues.push("ticker or symbol is required");
  }

  const priceField = firstPresent(data, ["close", "price"]);
  const price = priceField ? readNumericField(priceField[1]) : undefined;
  if (!priceField) {
    issues.push("close or price is required");
  } else if (typeof price !== "number" || price <= 0) {
    issues.push(`${priceField[0]} must be a positive number`);
  }

  const levels: Partial<Record<(typeof OPTIONAL_LEVELS)[number], number>> = {};
  for (const key of OPTIONAL_LEVELS) {
    const value = readNumericField(data[key]);
    if (value === null) {
      issues.push(`${key} must be a number`);
    } else if (value !== undefined) {
      levels[key] = value;
    }
  }

  if (issues.length > 0 || !direction || typeof price !== "number") {
    return err(new AlertPayloadError(issues));
  }

  const rawTimeframe =
    readLabel(firstPresent(data, ["interval", "timeframe"])?.[1]).toUpperCase() || DEFAULT_ALERT_TIMEFRAME;
  const comment = readLabel(data.comment);
  const time = readLabel(data.time);
  const clock = options.clock ?? (() => new Date());

  return ok({
    direction,
    action,
    symbol: rules?.assetIndex.get(rawSymbol) ?? rawSymbol,
    price,
    timeframe: rules?.timeframeAliases.get(rawTimeframe) ?? rawTimeframe,
    ...levels,
    ...(comment ? { comment } : {}),
    timestamp: time || clock().toISOString(),
  });
}
