export type { ModelCallFn, ModelCallOptions, ModelCallResult, ResponseFormat } from "./model.js";
export { MalformedResponseError } from "./errors.js";
export { extractJson } from "./extract-json.js";
export {
  DecisionOracle,
  DEFAULT_WAIT_SECONDS,
  MAX_WAIT_SECONDS,
  parseDecision,
  parseFollowUp,
  parseVerification,
  parseTestPlan,
} from "./decision-oracle.js";
export type { DecisionOracleOptions } from "./decision-oracle.js";
export type { ConsultSituation, TestPlanRequest } from "./prompts.js";
export { UsageAccumulator } from "./usage-accumulator.js";
export type { ModelPricing } from "./usage-accumulator.js";
export { PromptArchive } from "./prompt-archive.js";
export type { ArchivedPrompt } from "./prompt-archive.js";
