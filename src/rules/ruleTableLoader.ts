import fs from "node:fs/promises";

import { err, ok, type Result } from "../trading/result.js";
import {
  DIRECTIONS,
  type AssetRule,
  type Direction,
  type LevelRule,
  type LevelUnit,
  type RuleTable,
} from "./ruleTypes.js";

export class RuleTableConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid rule table: ${issues.join("; ")}`);
    this.name = "RuleTableConfigError";
    this.issues = issues;
  }
}

const UNIT_ALIASES: Record<string, LevelUnit> = {
  "%": "percent",
  percent: "percent",
  pct: "percent",
  pip: "pips",
  pips: "pips",
  point: "points",
  points: "points",
  pts: "points",
};

const DEFAULT_UNIT: LevelUnit = "percent";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeToken(value: string): string {
  return value.trim().toUpperCase();
}

function parseUnit(raw: unknown): LevelUnit | undefined {
  if (raw === undefined) {
    return DEFAULT_UNIT;
  }
  if (typeof raw !== "string") {
    return undefined;
  }
  return UNIT_ALIASES[raw.trim().toLowerCase()];
}

class AliasRegistry<V> {
  private readonly index = new Map<string, V>();

  constructor(
    private readonly category: string,
    private readonly issues: string[],
  ) {}

  register(alias: string, value: V): void {
    const existing = this.index.get(alias);
    if (existing !== undefined && existing !== value) {
      this.issues.push(
        `${this.category} alias "${alias}" maps to both ${String(existing)} and ${String(value)}`,
      );
      return;
    }
    this.index.set(alias, value);
  }

  entries(): ReadonlyMap<string, V> {
    return this.index;
  }
}

function readAliasList(raw: unknown, path: string, issues: string[]): string[] {
  if (raw === undefined) {
    return [];
  }
  if (!Array.isArray(raw)) {
    issues.push(`${path} must be an array of strings`);
    return [];
  }
  const aliases: string[] = [];
  raw.forEach((entry, index) => {
    if (typeof entry !== "string" || !entry.trim()) {
      issues.push(`${path}[${index}] must be a non-empty string`);
      return;
    }
    aliases.push(normalizeToken(entry));
  });
  return aliases;
}

function readDirections(
  raw: unknown,
  issues: string[],
): { directions: Map<Direction, ReadonlySet<string>>; index: ReadonlyMap<string, Direction> } {
  const directions = new Map<Direction, ReadonlySet<string>>();
  const registry = new AliasRegistry<Direction>("direction", issues);
  if (!isRecord(raw)) {
    issues.push("directions must be an object keyed by LONG and SHORT");
    return { directions, index: registry.entries() };
  }

  for (const key of Object.keys(raw)) {
    if (!DIRECTIONS.some((direction) => direction === normalizeToken(key))) {
      issues.push(`directions.${key} is not a recognized direction`);
    }
  }

  for (const direction of DIRECTIONS) {
    const entry = Object.entries(raw).find(([key]) => normalizeToken(key) === direction);
    if (!entry) {
      issues.push(`directions.${direction} is missing`);
      continue;
    }
    const aliases = new Set([direction, ...readAliasList(entry[1], `directions.${direction}`, issues)]);
    aliases.forEach((alias) => registry.register(alias, direction));
    directions.set(direction, aliases);
  }

  return { directions, index: registry.entries() };
}

function readTimeframeAliases(raw: unknown, issues: string[]): ReadonlyMap<string, string> {
  const registry = new AliasRegistry<string>("timeframe", issues);
  const source = isRecord(raw) ? raw.aliases : undefined;
  if (!isRecord(source)) {
    issues.push("timeframes.aliases must be an object mapping alias to timeframe");
    return registry.entries();
  }

  const pairs: [string, string][] = [];
  for (const [alias, target] of Object.entries(source)) {
    if (typeof target !== "string" || !target.trim()) {
      issues.push(`timeframes.aliases.${alias} must name a timeframe`);
      continue;
    }
    pairs.push([normalizeToken(alias), normalizeToken(target)]);
  }

  // Canonical names resolve to themselves before any alias is registered.
  new Set(pairs.map(([, canonical]) => canonical)).forEach((canonical) => {
    registry.register(canonical, canonical);
  });
  pairs.forEach(([alias, canonical]) => registry.register(alias, canonical));
  return registry.entries();
}

function readDistance(raw: RawRecord, key: string, path: string, issues: string[]): number {
  const value = raw[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    issues.push(`${path}.${key} must be a finite number`);
    return 0;
  }
  if (value < 0) {
    issues.push(`${path}.${key} must not be negative (got ${value})`);
  }
  return value;
}

function readLevelRule(raw: unknown, path: string, issues: string[]): LevelRule | undefined {
  if (!isRecord(raw)) {
    issues.push(`${path} must be an object with tp1, tp2, tp3, sl and unit`);
    return undefined;
  }
  const unit = parseUnit(raw.unit);
  if (!unit) {
    issues.push(`${path}.unit "${String(raw.unit)}" is not one of %, pips, points`);
    return undefined;
  }
  return {
    tp1Distance: readDistance(raw, "tp1", path, issues),
    tp2Distance: readDistance(raw, "tp2", path, issues),
    tp3Distance: readDistance(raw, "tp3", path, issues),
    slDistance: readDistance(raw, "sl", path, issues),
    unit,
  };
}

function readOptionalPositive(raw: RawRecord, key: string, path: string, issues: string[]): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    issues.push(`${path}.${key} must be a positive number`);
    return undefined;
  }
  return value;
}

function readDecimals(raw: RawRecord, path: string, issues: string[]): number | undefined {
  const value = raw.decimals;
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 10) {
    issues.push(`${path}.decimals must be an integer between 0 and 10`);
    return undefined;
  }
  return value;
}

function readAssets(
  raw: unknown,
  timeframeAliases: ReadonlyMap<string, string>,
  issues: string[],
): { assets: Map<string, AssetRule>; index: ReadonlyMap<string, string> } {
  const assets = new Map<string, AssetRule>();
  const registry = new AliasRegistry<string>("asset", issues);
  if (!isRecord(raw)) {
    issues.push("assets must be an object keyed by asset symbol");
    return { assets, index: registry.entries() };
  }

  const canonicalTimeframes = new Set(timeframeAliases.values());

  for (const [rawSymbol, definition] of Object.entries(raw)) {
    const symbol = normalizeToken(rawSymbol);
    const path = `assets.${symbol}`;
    if (!symbol) {
      issues.push("assets contains an empty symbol");
      continue;
    }
    if (assets.has(symbol)) {
      issues.push(`${path} is declared more than once`);
      continue;
    }
    if (!isRecord(definition)) {
      issues.push(`${path} must be an object`);
      continue;
    }

    const aliases = new Set([symbol, ...readAliasList(definition.aliases, `${path}.aliases`, issues)]);
    aliases.forEach((alias) => registry.register(alias, symbol));

    const timeframeRules = new Map<string, LevelRule>();
    if (!isRecord(definition.timeframes)) {
      issues.push(`${path}.timeframes must be an object keyed by timeframe`);
    } else {
      for (const [rawTimeframe, rule] of Object.entries(definition.timeframes)) {
        const timeframe = normalizeToken(rawTimeframe);
        if (!canonicalTimeframes.has(timeframe)) {
          issues.push(`${path}.timeframes.${timeframe} is not a known timeframe`);
          continue;
        }
        const levelRule = readLevelRule(rule, `${path}.timeframes.${timeframe}`, issues);
        if (levelRule) {
          timeframeRules.set(timeframe, levelRule);
        }
      }
    }

    assets.set(symbol, {
      symbol,
      aliases,
      timeframeRules,
      pipSize: readOptionalPositive(definition, "pipSize", path, issues),
      pointValue: readOptionalPositive(definition, "pointValue", path, issues),
      decimals: readDecimals(definition, path, issues),
      referencePrice: readOptionalPositive(definition, "referencePrice", path, issues),
    });
  }

  return { assets, index: registry.entries() };
}

/**
 * Validates raw rule definitions and builds every lookup index in one pass.
 * Structural problems are collected and reported together.
 */
export function loadRuleTable(source: unknown): Result<RuleTable, RuleTableConfigError> {
  const issues: string[] = [];
  if (!isRecord(source)) {
    return err(new RuleTableConfigError(["rule source must be an object"]));
  }

  const { directions, index: directionIndex } = readDirections(source.directions, issues);
  const timeframeAliases = readTimeframeAliases(source.timeframes, issues);
  const { assets, index: assetIndex } = readAssets(source.assets, timeframeAliases, issues);

  if (issues.length > 0) {
    return err(new RuleTableConfigError(issues));
  }

  const assetAliasesLongestFirst = Object.freeze(
    Array.from(assetIndex.keys()).sort((a, b) => b.length - a.length || a.localeCompare(b)),
  );

  return ok({
    directions,
    timeframeAliases,
    assets,
    directionIndex,
    assetIndex,
    assetAliasesLongestFirst,
    timeframes: Object.freeze(Array.from(new Set(timeframeAliases.values()))),
  });
}

export function loadRuleTableOrThrow(source: unknown): RuleTable {
  const result = loadRuleTable(source);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export async function loadRuleTableFile(filePath: string): Promise<RuleTable> {
  const content = await fs.readFile(filePath, { encoding: "utf8" });
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RuleTableConfigError([`${filePath} is not valid JSON: ${reason}`]);
  }
  return loadRuleTableOrThrow(parsed);
}
