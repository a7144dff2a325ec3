import { getConfig, type SignalServiceConfig } from "../config/configManager.js";
import { loadRuleTableFile } from "../rules/ruleTableLoader.js";
import type { RuleTable } from "../rules/ruleTypes.js";
import { createLogger } from "../telemetry/logger.js";
import { SignalPipeline } from "./signalPipeline.js";

let pipeline: SignalPipeline | undefined;

/**
 * Loads the rule table and builds the shared pipeline. A broken rule file
 * rejects here, before anything starts serving.
 */
export async function initSignalPipeline(config: SignalServiceConfig = getConfig()): Promise<SignalPipeline> {
  const logger = createLogger("pipeline", config.logLevel);
  const rules = await loadRuleTableFile(config.rulesPath);
  logger.info("rule table loaded", { path: config.rulesPath, assets: rules.assets.size });
  pipeline = new SignalPipeline({
    rules,
    formatter: { template: config.template, signature: config.signature },
    logger,
  });
  return pipeline;
}

export function getSignalPipeline(): SignalPipeline {
  if (!pipeline) {
    throw new Error("Signal pipeline has not been initialized");
  }
  return pipeline;
}

export async function reloadRuleTable(config: SignalServiceConfig = getConfig()): Promise<RuleTable> {
  const current = getSignalPipeline();
  const rules = await loadRuleTableFile(config.rulesPath);
  current.replaceRules(rules);
  return rules;
}
