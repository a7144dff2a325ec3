import { supportedTimeframes, type Direction, type RuleTable } from "../rules/ruleTypes.js";
import { err, ok, type Result } from "./result.js";
import { SignalError } from "./signalErrors.js";

export interface ParsedSignal {
  readonly direction: Direction;
  readonly asset: string;
  readonly timeframe: string;
  readonly entryPrice?: number;
  readonly originalText: string;
  readonly parsedAt: Date;
}

export interface ParseOptions {
  readonly clock?: () => Date;
}

/** A single way of pulling one field out of the normalized text. */
export type ExtractionStrategy<T> = (text: string, rules: RuleTable) => T | undefined;

const DIRECTION_WINDOW = 3;

// 🟢 and 🔴 are shorthand for buy and sell and survive token cleanup.
const NON_DIRECTION_CHARS = /[^\p{L}\p{N}_\u{1F7E2}\u{1F534}]/gu;
const NON_WORD_CHARS = /[^\p{L}\p{N}_]/gu;

const TIMEFRAME_PATTERN = /\b([MHD]\d+|\d+[MHD]|\d+MIN?|\d+)\b/gi;
const PRICE_PATTERN = /@\s*([\d.,]+)/;
const STRICT_DECIMAL = /^\d+(?:\.\d+)?$|^\.\d+$|^\d+\.$/;

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

function stripToken(token: string, pattern: RegExp = NON_WORD_CHARS): string {
  return token.replace(pattern, "");
}

export function normalizeSignalText(rawText: string): string {
  return rawText.trim().toUpperCase();
}

export const extractDirection: ExtractionStrategy<Direction> = (text, rules) => {
  for (const word of splitWords(text).slice(0, DIRECTION_WINDOW)) {
    const direction = rules.directionIndex.get(stripToken(word, NON_DIRECTION_CHARS));
    if (direction) {
      return direction;
    }
  }
  return undefined;
};

export const assetByToken: ExtractionStrategy<string> = (text, rules) => {
  for (const word of splitWords(text.replace(/@/g, " "))) {
    const asset = rules.assetIndex.get(stripToken(word));
    if (asset) {
      return asset;
    }
  }
  return undefined;
};

export const assetBySubstring: ExtractionStrategy<string> = (text, rules) => {
  for (const alias of rules.assetAliasesLongestFirst) {
    if (text.includes(alias)) {
      return rules.assetIndex.get(alias);
    }
  }
  return undefined;
};

export const timeframeByPattern: ExtractionStrategy<string> = (text, rules) => {
  for (const match of text.matchAll(TIMEFRAME_PATTERN)) {
    const timeframe = rules.timeframeAliases.get(match[1].toUpperCase());
    if (timeframe) {
      return timeframe;
    }
  }
  return undefined;
};

export const timeframeByToken: ExtractionStrategy<string> = (text, rules) => {
  for (const word of splitWords(text)) {
    const timeframe = rules.timeframeAliases.get(stripToken(word));
    if (timeframe) {
      return timeframe;
    }
  }
  return undefined;
};

export const ASSET_STRATEGIES: readonly ExtractionStrategy<string>[] = [assetByToken, assetBySubstring];
export const TIMEFRAME_STRATEGIES: readonly ExtractionStrategy<string>[] = [timeframeByPattern, timeframeByToken];

function firstMatch<T>(
  strategies: readonly ExtractionStrategy<T>[],
  text: string,
  rules: RuleTable,
): T | undefined {
  for (const strategy of strategies) {
    const value = strategy(text, rules);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Reads the optional `@price` marker. Thousands separators are dropped; a
 * literal that still is not a plain positive decimal counts as no price.
 */
export function extractEntryPrice(text: string): number | undefined {
  const match = PRICE_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const literal = match[1].replace(/,/g, "");
  if (!STRICT_DECIMAL.test(literal)) {
    return undefined;
  }
  const value = Number.parseFloat(literal);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function describeDirections(rules: RuleTable): string[] {
  return Array.from(rules.directionIndex.keys());
}

export function parseSignal(
  rawText: string,
  rules: RuleTable,
  options: ParseOptions = {},
): Result<ParsedSignal, SignalError> {
  const text = normalizeSignalText(rawText);

  const direction = extractDirection(text, rules);
  if (!direction) {
    const expected = describeDirections(rules);
    return err(
      new SignalError("NoDirection", `Direction not found. Use one of: ${expected.join(", ")}`, { expected }),
    );
  }

  const asset = firstMatch(ASSET_STRATEGIES, text, rules);
  if (!asset) {
    const expected = Array.from(rules.assets.keys());
    return err(
      new SignalError("NoAsset", `Asset not recognized. Available: ${expected.join(", ")}`, { expected }),
    );
  }

  const timeframe = firstMatch(TIMEFRAME_STRATEGIES, text, rules);
  if (!timeframe) {
    const expected = [...rules.timeframes];
    return err(
      new SignalError("NoTimeframe", `Timeframe not found. Use one of: ${expected.join(", ")}`, {
        asset,
        expected,
      }),
    );
  }

  const assetRule = rules.assets.get(asset);
  if (!assetRule?.timeframeRules.has(timeframe)) {
    const expected = assetRule ? supportedTimeframes(assetRule) : [];
    return err(
      new SignalError(
        "UnsupportedTimeframe",
        `Timeframe ${timeframe} is not configured for ${asset}. Available: ${expected.join(", ")}`,
        { asset, timeframe, expected },
      ),
    );
  }

  const entryPrice = extractEntryPrice(text);
  const clock = options.clock ?? (() => new Date());

  return ok({
    direction,
    asset,
    timeframe,
    entryPrice,
    originalText: rawText,
    parsedAt: clock(),
  });
}
