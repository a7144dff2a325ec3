import type { RuleTable } from "../rules/ruleTypes.js";
import {
  SignalFormatter,
  toPlainText,
  type FormattedSignal,
  type SignalFormatterOptions,
} from "../formatting/signalFormatter.js";
import { SilentLogger, type Logger } from "../telemetry/logger.js";
import { normalizeAlertPayload, type AlertPayloadError, type TradingViewAlert } from "../trading/alertPayload.js";
import { calculateLevels, type LevelRequest, type TradingLevels } from "../trading/levelCalculator.js";
import { err, ok, type Result } from "../trading/result.js";
import { assembleSignal, type SignalRecord } from "../trading/signalAssembler.js";
import type { SignalError } from "../trading/signalErrors.js";
import { parseSignal, type ParsedSignal } from "../trading/signalParser.js";
import { PriceProvider } from "./priceProvider.js";

export interface SignalPipelineOptions {
  readonly rules: RuleTable;
  readonly formatter?: Omit<SignalFormatterOptions, "decimals">;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

export interface ProcessOptions {
  /** Price to use when the message carries no `@price`. */
  readonly price?: number;
}

export interface PipelineOutput {
  readonly record: SignalRecord;
  readonly formatted: FormattedSignal;
}

export interface AlertOutput {
  readonly alert: TradingViewAlert;
  readonly text: string;
  readonly plainText: string;
}

export interface PipelineStats {
  readonly signalsProcessed: number;
  readonly errors: number;
  readonly lastSignalAt?: string;
}

export interface AssetSummary {
  readonly symbol: string;
  readonly aliases: string[];
  readonly timeframes: string[];
  readonly referencePrice?: number;
}

function decimalsByAsset(rules: RuleTable): ReadonlyMap<string, number> {
  const decimals = new Map<string, number>();
  rules.assets.forEach((asset, symbol) => {
    if (asset.decimals !== undefined) {
      decimals.set(symbol, asset.decimals);
    }
  });
  return decimals;
}

export class SignalPipeline {
  private rules: RuleTable;
  private formatter: SignalFormatter;
  private readonly formatterOptions: Omit<SignalFormatterOptions, "decimals">;
  private readonly priceProvider: PriceProvider;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private signalsProcessed = 0;
  private errors = 0;
  private lastSignalAt?: Date;

  constructor(options: SignalPipelineOptions) {
    this.rules = options.rules;
    this.formatterOptions = options.formatter ?? {};
    this.formatter = this.buildFormatter(options.rules);
    this.priceProvider = new PriceProvider(() => this.rules);
    this.logger = options.logger ?? new SilentLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  getRules(): RuleTable {
    return this.rules;
  }

  /** Swaps in a freshly loaded table; calls already running keep the old one. */
  replaceRules(rules: RuleTable): void {
    this.rules = rules;
    this.formatter = this.buildFormatter(rules);
    this.logger.info("rule table replaced", { assets: rules.assets.size });
  }

  parse(text: string): Result<ParsedSignal, SignalError> {
    return parseSignal(text, this.rules, { clock: this.clock });
  }

  calculate(request: LevelRequest): Result<TradingLevels, SignalError> {
    return calculateLevels(request, this.rules);
  }

  process(text: string, options: ProcessOptions = {}): Result<PipelineOutput, SignalError> {
    const rules = this.rules;
    const formatter = this.formatter;

    const parsed = parseSignal(text, rules, { clock: this.clock });
    if (!parsed.ok) {
      return this.fail(text, parsed.error);
    }
    const signal = parsed.value;

    const price = this.priceProvider.resolve(signal.asset, signal.entryPrice, options.price);
    if (!price.ok) {
      return this.fail(text, price.error);
    }

    const levels = calculateLevels(
      {
        direction: signal.direction,
        asset: signal.asset,
        timeframe: signal.timeframe,
        entryPrice: price.value.price,
      },
      rules,
    );
    if (!levels.ok) {
      return this.fail(text, levels.error);
    }

    const generatedAt = this.clock();
    const record = assembleSignal(signal, levels.value, { priceSource: price.value.source, generatedAt });
    const formatted = formatter.format(record);

    this.signalsProcessed += 1;
    this.lastSignalAt = generatedAt;
    this.logger.info("signal generated", {
      direction: record.direction,
      asset: record.asset,
      timeframe: record.timeframe,
      entry: record.levels.entry,
      priceSource: record.priceSource,
    });

    return ok({ record, formatted });
  }

  /** Normalizes a structured alert and renders it; levels come from the alert, not the rule table. */
  processAlert(data: unknown): Result<AlertOutput, AlertPayloadError> {
    const alert = normalizeAlertPayload(data, { clock: this.clock, rules: this.rules });
    if (!alert.ok) {
      this.logger.warn("alert rejected", { issues: alert.error.issues });
      return err(alert.error);
    }
    const text = this.formatter.formatAlert(alert.value);
    this.logger.info("alert formatted", {
      direction: alert.value.direction,
      symbol: alert.value.symbol,
      timeframe: alert.value.timeframe,
    });
    return ok({ alert: alert.value, text, plainText: toPlainText(text) });
  }

  listAssets(): AssetSummary[] {
    return Array.from(this.rules.assets.values()).map((asset) => ({
      symbol: asset.symbol,
      aliases: Array.from(asset.aliases).filter((alias) => alias !== asset.symbol),
      timeframes: Array.from(asset.timeframeRules.keys()),
      referencePrice: asset.referencePrice,
    }));
  }

  getStats(): PipelineStats {
    return {
      signalsProcessed: this.signalsProcessed,
      errors: this.errors,
      lastSignalAt: this.lastSignalAt?.toISOString(),
    };
  }

  private fail(text: string, error: SignalError): Result<PipelineOutput, SignalError> {
    this.errors += 1;
    this.logger.warn("signal rejected", { kind: error.kind, message: error.message, text });
    return err(error);
  }

  private buildFormatter(rules: RuleTable): SignalFormatter {
    return new SignalFormatter({ ...this.formatterOptions, decimals: decimalsByAsset(rules) });
  }
}
