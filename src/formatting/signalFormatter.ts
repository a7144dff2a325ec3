import type { Direction, LevelUnit } from "../rules/ruleTypes.js";
import type { TradingViewAlert } from "../trading/alertPayload.js";
import { serializeSignalRecord, type SignalRecord } from "../trading/signalAssembler.js";

export const TEMPLATES = {
  standard: `🚀 *{directionEmoji} {direction} {asset}*
━━━━━━━━━━━━━━━━━━━━
⏱️ Timeframe: \`{timeframe}\`
💵 Entry: \`{entry}\`

🎯 *Targets:*
├─ TP1: \`{tp1}\` ({tp1Distance})
├─ TP2: \`{tp2}\` ({tp2Distance})
└─ TP3: \`{tp3}\` ({tp3Distance})

🛡️ Stop Loss: \`{sl}\` ({slDistance})
📊 Risk/Reward: \`1:{riskReward}\`

⏰ {timestamp}
{signature}`,
  compact: `{directionEmoji} *{direction} {asset}* | {timeframe}
Entry: \`{entry}\`
TP: \`{tp1}\` → \`{tp2}\` → \`{tp3}\`
SL: \`{sl}\` | R:R \`1:{riskReward}\``,
  premium: `╔══════════════════════════════╗
║ {directionEmoji} *SIGNAL {direction}* {directionEmoji}
╠══════════════════════════════╣
║ 📈 *{asset}* | ⏱ *{timeframe}*
║ 💰 Entry: \`{entry}\`
╠══════════════════════════════╣
║ 🎯 TP1: \`{tp1}\` ➜ {tp1Distance}
║ 🎯 TP2: \`{tp2}\` ➜ {tp2Distance}
║ 🎯 TP3: \`{tp3}\` ➜ {tp3Distance}
║ 🛡️ SL: \`{sl}\` ➜ {slDistance}
╠══════════════════════════════╣
║ 📊 R:R *1:{riskReward}*
╚══════════════════════════════╝
⏰ _{timestamp}_
{signature}`,
  minimal: `{directionEmoji} {asset} {timeframe}
E: {entry} | TP: {tp1}/{tp2}/{tp3} | SL: {sl}`,
} as const;

export type TemplateName = keyof typeof TEMPLATES;

export const DEFAULT_SIGNATURE = "🤖 signal-levels";
const DEFAULT_DECIMALS = 2;

const UNIT_SUFFIX: Record<LevelUnit, string> = {
  percent: "%",
  pips: " pips",
  points: " pts",
};

export interface WebhookPayload {
  readonly action: "long" | "short";
  readonly symbol: string;
  readonly timeframe: string;
  readonly price: number;
  readonly targets: { readonly tp1: number; readonly tp2: number; readonly tp3: number };
  readonly stoploss: number;
  readonly risk_reward: number;
  readonly timestamp: string;
}

export interface FormattedSignal {
  readonly text: string;
  readonly plainText: string;
  readonly webhookPayload: WebhookPayload;
  readonly jsonDocument: Record<string, unknown>;
}

export interface SignalFormatterOptions {
  /** Built-in template name or a custom template with `{placeholder}` fields. */
  readonly template?: string;
  readonly signature?: string;
  /** Display precision per asset symbol. */
  readonly decimals?: ReadonlyMap<string, number>;
}

const ALERT_SEPARATOR = "━━━━━━━━━━━━━━━━━━━━";

function directionEmoji(direction: Direction): string {
  return direction === "LONG" ? "🟢" : "🔴";
}

export function toPlainText(text: string): string {
  return text.replace(/[*`_]/g, "");
}

export function isTemplateName(value: string): value is TemplateName {
  return Object.prototype.hasOwnProperty.call(TEMPLATES, value);
}

export function availableTemplates(): TemplateName[] {
  return Object.keys(TEMPLATES).filter(isTemplateName);
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${date.getUTCFullYear()} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
  );
}

/** Whole distances keep one decimal (`1.0`), others print as they are. */
export function formatDistance(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder,
  );
}

export class SignalFormatter {
  private readonly template: string;
  private readonly templateName: TemplateName | "custom";
  private readonly signature: string;
  private readonly decimals: ReadonlyMap<string, number>;

  constructor(options: SignalFormatterOptions = {}) {
    const template = options.template ?? "standard";
    if (isTemplateName(template)) {
      this.template = TEMPLATES[template];
      this.templateName = template;
    } else {
      this.template = template;
      this.templateName = "custom";
    }
    this.signature = options.signature ?? DEFAULT_SIGNATURE;
    this.decimals = options.decimals ?? new Map();
  }

  formatPrice(value: number, asset: string): string {
    return value.toFixed(this.decimals.get(asset) ?? DEFAULT_DECIMALS);
  }

  format(record: SignalRecord): FormattedSignal {
    const { levels } = record;
    const suffix = UNIT_SUFFIX[levels.unit];
    const timestamp = formatTimestamp(record.generatedAt);

    const text = renderTemplate(this.template, {
      direction: levels.direction,
      directionEmoji: directionEmoji(levels.direction),
      asset: levels.asset,
      timeframe: levels.timeframe,
      entry: this.formatPrice(levels.entry, levels.asset),
      tp1: this.formatPrice(levels.tp1, levels.asset),
      tp2: this.formatPrice(levels.tp2, levels.asset),
      tp3: this.formatPrice(levels.tp3, levels.asset),
      sl: this.formatPrice(levels.sl, levels.asset),
      tp1Distance: `+${formatDistance(levels.tp1Distance)}${suffix}`,
      tp2Distance: `+${formatDistance(levels.tp2Distance)}${suffix}`,
      tp3Distance: `+${formatDistance(levels.tp3Distance)}${suffix}`,
      slDistance: `-${formatDistance(levels.slDistance)}${suffix}`,
      riskReward: String(levels.riskRewardRatio),
      timestamp,
      signature: this.signature,
    }).trim();

    const plainText = toPlainText(text);

    return {
      text,
      plainText,
      webhookPayload: this.buildWebhookPayload(record),
      jsonDocument: {
        signal: serializeSignalRecord(record),
        formatted: { text, plain: plainText },
        meta: { timestamp, template: this.templateName },
      },
    };
  }

  /** Renders an incoming alert as it arrived; levels it lacks are left out. */
  formatAlert(alert: TradingViewAlert): string {
    const price = (value: number) => this.formatPrice(value, alert.symbol);
    const lines = [
      `${directionEmoji(alert.direction)} *${alert.direction} ${alert.symbol}*`,
      ALERT_SEPARATOR,
      `⏱️ Timeframe: \`${alert.timeframe}\``,
      `💵 Entry: \`${price(alert.price)}\``,
    ];

    const targets: [string, number][] = [];
    for (const [label, value] of [
      ["TP1", alert.tp1],
      ["TP2", alert.tp2],
      ["TP3", alert.tp3],
    ] as const) {
      if (value !== undefined) {
        targets.push([label, value]);
      }
    }
    if (targets.length > 0) {
      lines.push("", "🎯 *Targets:*");
      targets.forEach(([label, value], index) => {
        const branch = index === targets.length - 1 ? "└─" : "├─";
        lines.push(`${branch} ${label}: \`${price(value)}\``);
      });
    }
    if (alert.sl !== undefined) {
      lines.push("", `🛡️ Stop Loss: \`${price(alert.sl)}\``);
    }
    if (alert.comment) {
      lines.push("", `📝 ${alert.comment}`);
    }
    lines.push("", `⏰ ${alert.timestamp}`, this.signature);
    return lines.join("\n");
  }

  private buildWebhookPayload(record: SignalRecord): WebhookPayload {
    const { levels } = record;
    return {
      action: levels.direction === "LONG" ? "long" : "short",
      symbol: levels.asset,
      timeframe: levels.timeframe,
      price: levels.entry,
      targets: { tp1: levels.tp1, tp2: levels.tp2, tp3: levels.tp3 },
      stoploss: levels.sl,
      risk_reward: levels.riskRewardRatio,
      timestamp: record.generatedAt.toISOString(),
    };
  }
}
