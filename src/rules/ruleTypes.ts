export type Direction = "LONG" | "SHORT";

export const DIRECTIONS: readonly Direction[] = ["LONG", "SHORT"];

export type LevelUnit = "percent" | "pips" | "points";

export interface LevelRule {
  readonly tp1Distance: number;
  readonly tp2Distance: number;
  readonly tp3Distance: number;
  readonly slDistance: number;
  readonly unit: LevelUnit;
}

export interface AssetRule {
  readonly symbol: string;
  readonly aliases: ReadonlySet<string>;
  readonly timeframeRules: ReadonlyMap<string, LevelRule>;
  /** Price delta of one pip; the calculator falls back to 0.0001. */
  readonly pipSize?: number;
  /** Price delta of one point; the calculator falls back to 1. */
  readonly pointValue?: number;
  /** Decimal places used when rendering prices of this asset. */
  readonly decimals?: number;
  /** Static price used when neither the message nor the caller supplies one. */
  readonly referencePrice?: number;
}

/**
 * Validated rule configuration plus the lookup indices derived from it.
 * Built once by the loader and shared read-only between callers; a reload
 * produces a new table instead of mutating this one.
 */
export interface RuleTable {
  readonly directions: ReadonlyMap<Direction, ReadonlySet<string>>;
  readonly timeframeAliases: ReadonlyMap<string, string>;
  readonly assets: ReadonlyMap<string, AssetRule>;
  readonly directionIndex: ReadonlyMap<string, Direction>;
  readonly assetIndex: ReadonlyMap<string, string>;
  readonly assetAliasesLongestFirst: readonly string[];
  readonly timeframes: readonly string[];
}

export function supportedTimeframes(asset: AssetRule): string[] {
  return Array.from(asset.timeframeRules.keys());
}
