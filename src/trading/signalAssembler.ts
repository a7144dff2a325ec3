import type { Direction } from "../rules/ruleTypes.js";
import type { TradingLevels } from "./levelCalculator.js";
import type { ParsedSignal } from "./signalParser.js";

export type PriceSource = "message" | "caller" | "reference";

export interface SignalRecord {
  readonly direction: Direction;
  readonly asset: string;
  readonly timeframe: string;
  readonly originalText: string;
  readonly parsedAt: Date;
  readonly generatedAt: Date;
  readonly priceSource: PriceSource;
  readonly levels: TradingLevels;
}

export interface AssembleOptions {
  readonly priceSource: PriceSource;
  readonly generatedAt?: Date;
}

export function assembleSignal(
  parsed: ParsedSignal,
  levels: TradingLevels,
  options: AssembleOptions,
): SignalRecord {
  if (parsed.asset !== levels.asset || parsed.timeframe !== levels.timeframe || parsed.direction !== levels.direction) {
    throw new Error(
      `Levels for ${levels.direction} ${levels.asset} ${levels.timeframe} do not belong to ` +
        `${parsed.direction} ${parsed.asset} ${parsed.timeframe}`,
    );
  }
  return Object.freeze({
    direction: parsed.direction,
    asset: parsed.asset,
    timeframe: parsed.timeframe,
    originalText: parsed.originalText,
    parsedAt: parsed.parsedAt,
    generatedAt: options.generatedAt ?? new Date(),
    priceSource: options.priceSource,
    levels,
  });
}

/** Plain JSON view of a record with ISO timestamps. */
export function serializeSignalRecord(record: SignalRecord): Record<string, unknown> {
  return {
    direction: record.direction,
    asset: record.asset,
    timeframe: record.timeframe,
    originalText: record.originalText,
    parsedAt: record.parsedAt.toISOString(),
    generatedAt: record.generatedAt.toISOString(),
    priceSource: record.priceSource,
    levels: { ...record.levels },
  };
}
