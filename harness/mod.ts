export * from "./types.ts";
export * from "./lib/errors.ts";
export { enumerate } from "./lib/enumerate.ts";
export { globMatcher, isGlob, splitGlob } from "./lib/glob.ts";
export {
  type Capture,
  type ExtractionStrategy,
  exitStatus,
  extractText,
  strategyFor,
  textVerdict,
} from "./lib/extract.ts";
export {
  captureApi,
  createInvoker,
  fillArguments,
  type Invoker,
  resolveInvocation,
} from "./lib/invoke.ts";
export { compare, isUnrecognized } from "./lib/compare.ts";
export {
  formatCase,
  formatResult,
  formatSummary,
  report,
  reportApi,
} from "./lib/report.ts";
export { exitCode, runCase, runSuite, stateOf, tally } from "./lib/suite.ts";
export { type ConfigOverrides, loadConfig, resolveConfig } from "./lib/config.ts";
export { log, loggerApi, verboseLogging } from "./logger.ts";
