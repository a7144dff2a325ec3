import type { RuleTable } from "../rules/ruleTypes.js";
import { err, ok, type Result } from "../trading/result.js";
import { SignalError } from "../trading/signalErrors.js";
import type { PriceSource } from "../trading/signalAssembler.js";

export interface ResolvedPrice {
  readonly price: number;
  readonly source: PriceSource;
}

function isUsablePrice(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Picks the entry price for a signal: the `@price` from the message wins, then
 * a price handed in by the caller, then the asset's static reference price.
 */
export class PriceProvider {
  constructor(private readonly rules: () => RuleTable) {}

  resolve(asset: string, messagePrice?: number, callerPrice?: number): Result<ResolvedPrice, SignalError> {
    if (isUsablePrice(messagePrice)) {
      return ok({ price: messagePrice, source: "message" });
    }
    if (isUsablePrice(callerPrice)) {
      return ok({ price: callerPrice, source: "caller" });
    }
    const reference = this.rules().assets.get(asset)?.referencePrice;
    if (isUsablePrice(reference)) {
      return ok({ price: reference, source: "reference" });
    }
    return err(new SignalError("PriceUnavailable", `No price available for ${asset}`, { asset }));
  }
}
