#!/usr/bin/env node
import { getConfig } from "./config/configManager.js";
import { initSignalPipeline } from "./runtime/serviceRegistry.js";

export const DEFAULT_SIGNAL = "LONG BTCUSD M5";

function getSignalText(): string {
  const override = process.env.SIGNAL_TEXT?.trim();
  if (override) {
    return override;
  }
  const fromArgs = process.argv.slice(2).join(" ").trim();
  if (fromArgs.length > 0) {
    return fromArgs;
  }
  return DEFAULT_SIGNAL;
}

async function main() {
  const config = getConfig();
  const pipeline = await initSignalPipeline(config);
  const signalText = getSignalText();
  console.log("[cli] raw signal:", signalText);

  const result = pipeline.process(signalText);
  if (!result.ok) {
    console.error(`[cli] ${result.error.kind}: ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  console.log(result.value.formatted.text);
  console.log("[cli] webhook payload:", JSON.stringify(result.value.formatted.webhookPayload, null, 2));
}

main().catch((error) => {
  console.error("[cli] fatal error:", error);
  process.exitCode = 1;
});
