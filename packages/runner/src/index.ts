export { systemClock, VirtualClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { createMonitoringData } from "./monitoring-data.js";
export { applyDelta, ERROR_KEYWORDS, ERROR_SCAN_LINES } from "./delta-tracker.js";
export type { DeltaSummary } from "./delta-tracker.js";
export { computeVerdict, buildStats, buildFailureDescription, buildAnalysisContext } from "./verdict.js";
export type { Verdict } from "./verdict.js";
export { Supervisor, runSupervisedSession } from "./supervision-loop.js";
export type { SupervisionConfig, SupervisionBridge, SupervisionOracle, AnalysisOracle } from "./supervision-loop.js";
export { TestExecutor, checkExpectation } from "./test-executor.js";
export type { TestExecutorOptions, ExecutorBridge, ExecutorOracle } from "./test-executor.js";
