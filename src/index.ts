export * from "./rules/ruleTypes.js";
export * from "./rules/ruleTableLoader.js";
export * from "./trading/result.js";
export * from "./trading/signalErrors.js";
export * from "./trading/signalParser.js";
export * from "./trading/levelCalculator.js";
export * from "./trading/signalAssembler.js";
export * from "./trading/alertPayload.js";
export * from "./formatting/signalFormatter.js";
export { PriceProvider } from "./runtime/priceProvider.js";
export { SignalPipeline } from "./runtime/signalPipeline.js";
export type { Logger } from "./telemetry/logger.js";
export { ConsoleLogger, SilentLogger, createLogger } from "./telemetry/logger.js";
