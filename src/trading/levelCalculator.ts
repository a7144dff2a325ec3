import type { AssetRule, Direction, LevelRule, LevelUnit, RuleTable } from "../rules/ruleTypes.js";
import { err, ok, type Result } from "./result.js";
import { SignalError } from "./signalErrors.js";

export const DEFAULT_PIP_SIZE = 0.0001;
export const DEFAULT_POINT_VALUE = 1;

export interface LevelRequest {
  readonly direction: Direction;
  readonly asset: string;
  readonly timeframe: string;
  readonly entryPrice: number;
}

export interface TradingLevels {
  readonly direction: Direction;
  readonly asset: string;
  readonly timeframe: string;
  readonly entry: number;
  readonly tp1: number;
  readonly tp2: number;
  readonly tp3: number;
  readonly sl: number;
  readonly tp1Distance: number;
  readonly tp2Distance: number;
  readonly tp3Distance: number;
  readonly slDistance: number;
  readonly unit: LevelUnit;
  readonly riskRewardRatio: number;
}

/**
 * Rounds to two decimals on the exact binary value, ties to even. A double sits
 * exactly between two cents only when `8 * value` is an odd integer (1.125,
 * 0.375); every other value rounds correctly through `toFixed`.
 */
export function roundRiskReward(value: number): number {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const lowerCents = Math.floor(value * 100);
    const evenCents = lowerCents % 2 === 0 ? lowerCents : lowerCents + 1;
    return evenCents / 100;
  }
  return Number(value.toFixed(2));
}

export function computeRiskReward(rule: LevelRule): number {
  if (!(rule.slDistance > 0)) {
    return 0;
  }
  const averageTarget = (rule.tp1Distance + rule.tp2Distance + rule.tp3Distance) / 3;
  return roundRiskReward(averageTarget / rule.slDistance);
}

function profitSign(direction: Direction): 1 | -1 {
  switch (direction) {
    case "LONG":
      return 1;
    case "SHORT":
      return -1;
    default: {
      const exhaustive: never = direction;
      throw new Error(`Unhandled direction ${String(exhaustive)}`);
    }
  }
}

/** Builds the function that moves the entry price by a signed distance. */
function priceShifter(unit: LevelUnit, entry: number, asset: AssetRule): (signedDistance: number) => number {
  switch (unit) {
    case "percent":
      return (signedDistance) => entry * (1 + signedDistance / 100);
    case "pips": {
      const pipSize = asset.pipSize ?? DEFAULT_PIP_SIZE;
      return (signedDistance) => entry + signedDistance * pipSize;
    }
    case "points": {
      const pointValue = asset.pointValue ?? DEFAULT_POINT_VALUE;
      return (signedDistance) => entry + signedDistance * pointValue;
    }
    default: {
      const exhaustive: never = unit;
      throw new Error(`Unhandled level unit ${String(exhaustive)}`);
    }
  }
}

export function calculateLevels(request: LevelRequest, rules: RuleTable): Result<TradingLevels, SignalError> {
  const { direction, asset, timeframe, entryPrice } = request;

  const assetRule = rules.assets.get(asset);
  const rule = assetRule?.timeframeRules.get(timeframe);
  if (!assetRule || !rule) {
    return err(
      new SignalError("UnknownRule", `No level rule configured for ${asset} ${timeframe}`, { asset, timeframe }),
    );
  }

  if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
    return err(
      new SignalError("InvalidEntryPrice", `Entry price must be a positive number (got ${entryPrice})`, {
        asset,
        timeframe,
      }),
    );
  }

  const sign = profitSign(direction);
  const shift = priceShifter(rule.unit, entryPrice, assetRule);

  return ok({
    direction,
    asset,
    timeframe,
    entry: entryPrice,
    tp1: shift(sign * rule.tp1Distance),
    tp2: shift(sign * rule.tp2Distance),
    tp3: shift(sign * rule.tp3Distance),
    sl: shift(-sign * rule.slDistance),
    tp1Distance: rule.tp1Distance,
    tp2Distance: rule.tp2Distance,
    tp3Distance: rule.tp3Distance,
    slDistance: rule.slDistance,
    unit: rule.unit,
    riskRewardRatio: computeRiskReward(rule),
  });
}
