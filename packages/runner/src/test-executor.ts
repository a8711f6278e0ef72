import { v4 as uuid } from "uuid";
import type {
  BridgeResult,
  FeatureTestReport,
  JournalEventType,
  StepOutcome,
  TestPlan,
  TestStep,
  Verification,
} from "@mudprobe/schemas";
import type { BridgeClient } from "@mudprobe/bridge";
import type { Journal } from "@mudprobe/journal";
import { MalformedResponseError } from "@mudprobe/oracle";
import type { DecisionOracle, TestPlanRequest, UsageAccumulator } from "@mudprobe/oracle";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";

export type ExecutorBridge = Pick<BridgeClient, "observeState" | "getRecentOutput" | "callTool" | "waitForOutput">;
export type ExecutorOracle = Pick<DecisionOracle, "requestTestPlan" | "verifyOutput">;

export interface TestExecutorOptions {
  clock?: Clock;
  /** Pause between steps. Default: 500 */
  stepPauseMs?: number;
  /** How long a step's `wait_for` pattern is awaited. Default: 5000 */
  waitForTimeoutMs?: number;
  journal?: Journal;
  usage?: UsageAccumulator;
  runId?: string;
  log?: (line: string) => void;
}

const FEATURE_CONTEXT_LINES = 30;
const CUSTOM_CONTEXT_LINES = 20;
const VERIFY_CONTEXT_LINES = 15;

/**
 * Pass/fail for a step nobody asked the oracle to verify: explicit success
 * wins, then the expected text showing up anywhere in the result, then the
 * absence of an error.
 */
export function checkExpectation(result: BridgeResult, expected: string): boolean {
  if (result.success === true) return true;
  if (expected && JSON.stringify(result).toLowerCase().includes(expected.toLowerCase())) return true;
  if ("error" in result) return false;
  return true;
}

/** Asks the oracle for a test plan once, then runs it step by step. */
export class TestExecutor {
  private bridge: ExecutorBridge;
  private oracle: ExecutorOracle;
  private clock: Clock;
  private stepPauseMs: number;
  private waitForTimeoutMs: number;
  private journal?: Journal;
  private usage?: UsageAccumulator;
  private runId: string;
  private log: (line: string) => void;

  constructor(bridge: ExecutorBridge, oracle: ExecutorOracle, options: TestExecutorOptions = {}) {
    this.bridge = bridge;
    this.oracle = oracle;
    this.clock = options.clock ?? systemClock;
    this.stepPauseMs = options.stepPauseMs ?? 500;
    this.waitForTimeoutMs = options.waitForTimeoutMs ?? 5000;
    this.journal = options.journal;
    this.usage = options.usage;
    this.runId = options.runId ?? uuid();
    this.log = options.log ?? ((line) => console.log(line));
  }

  async testFeature(feature: string, instructions: string): Promise<FeatureTestReport> {
    this.log(`[executor] testing ${feature}`);
    const snapshot = await this.bridge.observeState();
    const recentOutput = await this.bridge.getRecentOutput(FEATURE_CONTEXT_LINES);
    return this.execute({ feature, snapshot, recentOutput, instructions });
  }

  async testWithCustomPrompt(feature: string, customPrompt: string): Promise<FeatureTestReport> {
    this.log(`[executor] custom test of ${feature}`);
    const snapshot = await this.bridge.observeState();
    const recentOutput = await this.bridge.getRecentOutput(CUSTOM_CONTEXT_LINES);
    const report = await this.execute({ feature, snapshot, recentOutput, customPrompt });
    return { ...report, customPrompt };
  }

  private async execute(request: TestPlanRequest): Promise<FeatureTestReport> {
    const { feature } = request;
    this.log("[executor] requesting a test plan...");
    let plan: TestPlan;
    try {
      plan = await this.oracle.requestTestPlan(request);
    } catch (err) {
      if (err instanceof MalformedResponseError) {
        this.log(`[executor] could not parse the test plan: ${err.message}`);
        await this.record("executor.plan_rejected", { feature, error: err.message });
        return this.report({
          feature,
          results: [],
          overallPass: false,
          error: "Failed to parse test plan",
          llmResponse: err.responseText,
        });
      }
      const message = err instanceof Error ? err.message : String(err);
      this.log(`[executor] test plan request failed: ${message}`);
      await this.record("executor.plan_rejected", { feature, error: message });
      return this.report({ feature, results: [], overallPass: false, error: `Test plan request failed: ${message}` });
    }

    this.log(`[executor] plan: ${plan.test_name ?? "Unnamed test"} (${plan.steps.length} steps)`);
    if (plan.description) this.log(`[executor] ${plan.description}`);
    await this.record("executor.plan_received", {
      feature,
      test_name: plan.test_name ?? null,
      steps: plan.steps.map((s) => s.action),
    });

    const results: StepOutcome[] = [];
    for (const [index, step] of plan.steps.entries()) {
      if (index > 0) await this.clock.sleep(this.stepPauseMs);
      const outcome = await this.runStep(index, step);
      results.push(outcome);
      await this.record("executor.step_completed", { index, action: step.action, passed: outcome.passed });
    }

    // every() over an empty plan is a pass
    const overallPass = results.every((r) => r.passed);
    this.log(overallPass ? "[executor] PASSED" : "[executor] FAILED");
    await this.record("executor.completed", { feature, overall_pass: overallPass, steps: results.length });
    return this.report({ feature, testPlan: plan, results, overallPass });
  }

  private async runStep(index: number, step: TestStep): Promise<StepOutcome> {
    const params = step.params ?? {};
    const expected = step.expected ?? "";
    this.log(`[executor] step ${index + 1}: ${step.action} ${JSON.stringify(params)}`);

    const result = await this.bridge.callTool(step.action, params);

    if (step.wait_for) {
      const waited = await this.bridge.waitForOutput(step.wait_for, this.waitForTimeoutMs);
      if (waited.found === true) {
        this.log(`[executor]   found '${step.wait_for}': ${String(waited.matching_line ?? "").slice(0, 60)}`);
      } else {
        this.log(`[executor]   '${step.wait_for}' not seen within ${this.waitForTimeoutMs}ms`);
      }
    }

    let passed: boolean;
    let verification: Verification | undefined;
    if (step.verify_output) {
      const recent = await this.bridge.getRecentOutput(VERIFY_CONTEXT_LINES);
      verification = await this.oracle.verifyOutput(step.action, params, result, expected, recent);
      passed = verification.passed;
      this.log(`[executor]   oracle: ${verification.analysis}`);
    } else {
      passed = checkExpectation(result, expected);
    }
    this.log(`[executor]   ${passed ? "PASS" : "FAIL"}${expected ? `: ${expected}` : ""}`);

    return { step, result, ...(verification ? { verification } : {}), passed };
  }

  private report(fields: Omit<FeatureTestReport, "kind" | "usage">): FeatureTestReport {
    return {
      kind: "feature",
      ...fields,
      ...(this.usage ? { usage: this.usage.getSummary() } : {}),
    };
  }

  private async record(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.journal?.tryEmit(this.runId, type, payload);
  }
}
