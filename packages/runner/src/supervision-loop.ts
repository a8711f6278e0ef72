import { v4 as uuid } from "uuid";
import type {
  BridgeResult,
  Decision,
  FollowUpDecision,
  InterveneDecision,
  JournalEventType,
  MonitoringData,
  RunState,
  SetupFailureReport,
  Snapshot,
  SupervisionReport,
  SupervisionResult,
} from "@mudprobe/schemas";
import type { BridgeClient } from "@mudprobe/bridge";
import type { Journal } from "@mudprobe/journal";
import type { DecisionOracle, UsageAccumulator } from "@mudprobe/oracle";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { applyDelta, ERROR_SCAN_LINES } from "./delta-tracker.js";
import { createMonitoringData } from "./monitoring-data.js";
import { buildAnalysisContext, buildFailureDescription, buildStats, computeVerdict } from "./verdict.js";

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type SupervisionBridge = Pick<BridgeClient, "setAutomation" | "observeState" | "getRecentOutput" | "sendCommand">;
export type SupervisionOracle = Pick<DecisionOracle, "consult" | "followUp">;
export type AnalysisOracle = Pick<DecisionOracle, "analyzeFailure">;

export interface SupervisionConfig {
  feature: string;
  durationSeconds: number;
  /** Minimum seconds between oracle consultations. Default: 10 */
  checkIntervalSeconds?: number;
  /** Poll period. Default: 5000 */
  tickMs?: number;
  /** Pause after each intervention command. Default: 1000 */
  commandPauseMs?: number;
  signal?: AbortSignal;
  clock?: Clock;
  journal?: Journal;
  /** Asked for a failure analysis when the run fails. */
  analysisOracle?: AnalysisOracle;
  /** Reported as the run's token usage. */
  usage?: UsageAccumulator;
  runId?: string;
  log?: (line: string) => void;
}

const VALID_TRANSITIONS: Record<RunState, RunState[]> = {
  running: ["completed", "aborted", "interrupted", "faulted"],
  completed: [],
  aborted: [],
  interrupted: [],
  faulted: [],
};

/**
 * Runs one automation feature for a fixed duration while the oracle watches.
 * The automation is enabled first and, once enabled, disabled again exactly
 * once however the run ends. `run()` resolves with a report; it does not throw.
 */
export class Supervisor {
  private bridge: SupervisionBridge;
  private oracle: SupervisionOracle;
  private feature: string;
  private durationMs: number;
  private checkIntervalMs: number;
  private tickMs: number;
  private commandPauseMs: number;
  private signal?: AbortSignal;
  private clock: Clock;
  private journal?: Journal;
  private analysisOracle?: AnalysisOracle;
  private usage?: UsageAccumulator;
  private log: (line: string) => void;

  readonly runId: string;
  private state: RunState = "running";
  private data: MonitoringData = createMonitoringData();
  private startedAt = 0;
  private running = false;

  constructor(bridge: SupervisionBridge, oracle: SupervisionOracle, config: SupervisionConfig) {
    this.bridge = bridge;
    this.oracle = oracle;
    this.feature = config.feature;
    this.durationMs = config.durationSeconds * 1000;
    this.checkIntervalMs = (config.checkIntervalSeconds ?? 10) * 1000;
    this.tickMs = config.tickMs ?? 5000;
    this.commandPauseMs = config.commandPauseMs ?? 1000;
    this.signal = config.signal;
    this.clock = config.clock ?? systemClock;
    this.journal = config.journal;
    this.analysisOracle = config.analysisOracle;
    this.usage = config.usage;
    this.runId = config.runId ?? uuid();
    this.log = config.log ?? ((line) => console.log(line));
  }

  get testName(): string {
    return `extended_${this.feature}`;
  }

  async run(): Promise<SupervisionResult> {
    if (this.running) throw new Error("Supervisor is already running. Concurrent run() calls are not allowed.");
    this.running = true;

    this.log(`[supervisor] enabling ${this.feature}...`);
    const enabled = await this.bridge.setAutomation(this.feature, true);
    if (enabled.success !== true) {
      const report: SetupFailureReport = {
        kind: "setup_failed",
        test: this.testName,
        feature: this.feature,
        passed: false,
        error: `Failed to enable ${this.feature}`,
        result: enabled,
      };
      this.log(`[supervisor] ${report.error}: ${enabled.error ?? "bridge did not confirm"}`);
      await this.record("run.setup_failed", { feature: this.feature, result: enabled });
      return report;
    }

    this.startedAt = this.clock.now();
    await this.record("run.started", {
      feature: this.feature,
      duration_seconds: this.durationMs / 1000,
      check_interval_seconds: this.checkIntervalMs / 1000,
    });
    this.log(`[supervisor] ${this.feature} enabled; watching for ${this.durationMs / 1000}s, oracle every ${this.checkIntervalMs / 1000}s`);

    try {
      await this.loop();
    } catch (err) {
      const message = errorText(err);
      this.data.issues.push(`[${this.elapsedSeconds()}s] FAULT: ${message}`);
      this.log(`[supervisor] run faulted: ${message}`);
      if (this.state === "running") this.transition("faulted");
      await this.record("run.faulted", { error: message });
    } finally {
      await this.teardown();
    }

    return this.finish();
  }

  private async loop(): Promise<void> {
    let previous = await this.bridge.observeState();
    let lastConsultation = this.startedAt;

    while (this.state === "running") {
      if (this.interrupted()) break;
      if (this.clock.now() - this.startedAt >= this.durationMs) {
        this.transition("completed");
        break;
      }

      await this.clock.sleep(this.tickMs, this.signal);
      if (this.interrupted()) break;

      const current = await this.bridge.observeState();
      const recent = await this.bridge.getRecentOutput(ERROR_SCAN_LINES);
      const elapsed = this.elapsedSeconds();
      await this.observe(previous, current, recent, elapsed);

      const atEnd = this.clock.now() - this.startedAt >= this.durationMs;
      if (!atEnd && this.clock.now() - lastConsultation >= this.checkIntervalMs) {
        await this.consult(current, recent, elapsed);
        lastConsultation = this.clock.now();
      }

      previous = current;
    }
  }

  private async observe(previous: Snapshot, current: Snapshot, recent: string[], elapsed: number): Promise<void> {
    if (current.error) {
      this.log(`[supervisor] [${elapsed}s] bridge: ${current.error}`);
    }
    const delta = applyDelta(previous, current, recent, elapsed, this.data);
    if (delta.hpChange) {
      this.log(`[supervisor] [${elapsed}s] HP: ${delta.hpChange.from} → ${delta.hpChange.to} (${delta.hpChange.percent}%)`);
    }
    if (delta.appeared.length > 0) this.log(`[supervisor] [${elapsed}s] monster appeared: ${delta.appeared.join(", ")}`);
    if (delta.vanished.length > 0) this.log(`[supervisor] [${elapsed}s] monster gone: ${delta.vanished.join(", ")}`);
    if (delta.combatEvent) {
      this.log(`[supervisor] [${elapsed}s] combat: ${delta.combatEvent.target ?? "?"} (HP ${delta.combatEvent.hpPercent}%)`);
    }
    for (const e of delta.newErrors) this.log(`[supervisor] [${elapsed}s] game error: ${e.message}`);

    await this.record("run.tick", {
      elapsed,
      hp: current.character.hp,
      hp_percent: current.character.hpPercent,
      in_combat: current.combat.inCombat,
      ...(current.error ? { bridge_error: current.error } : {}),
    });
    if (delta.hpChange) await this.record("run.hp_changed", { ...delta.hpChange });
    if (delta.appeared.length > 0 || delta.vanished.length > 0) {
      await this.record("run.monsters_changed", { elapsed, appeared: delta.appeared, vanished: delta.vanished });
    }
    for (const e of delta.newErrors) await this.record("run.game_error", { ...e });
  }

  private async consult(current: Snapshot, recent: string[], elapsed: number): Promise<void> {
    this.log(`[supervisor] [${elapsed}s] consulting oracle...`);
    let decision: Decision;
    try {
      decision = await this.oracle.consult({
        feature: this.feature,
        snapshot: current,
        recentOutput: recent,
        monitoring: this.data,
        elapsedSeconds: elapsed,
        totalSeconds: this.durationMs / 1000,
      });
    } catch (err) {
      const message = errorText(err);
      this.log(`[supervisor] [${elapsed}s] oracle consultation failed: ${message}`);
      decision = {
        action: "continue",
        reasoning: `Oracle error: ${message}, continuing cautiously`,
        assessment: "Oracle consultation failed",
      };
    }
    this.data.decisions.push({ time: elapsed, type: "periodic", decision });
    await this.record("oracle.consulted", { elapsed, ...describeDecision(decision) });

    switch (decision.action) {
      case "continue":
        this.log(`[supervisor] oracle: continue (${decision.reasoning})`);
        return;
      case "abort":
        this.data.interventions.push({
          time: elapsed,
          reason: "ORACLE_ABORT",
          action: decision.reasoning,
          details: decision,
        });
        this.data.issues.push(`[${elapsed}s] ORACLE ABORT: ${decision.reasoning}`);
        this.log(`[supervisor] oracle: ABORT (${decision.reasoning})`);
        this.transition("aborted");
        await this.record("run.aborted", { elapsed, reasoning: decision.reasoning, stage: "periodic" });
        return;
      case "intervene":
        await this.intervene(decision, elapsed);
        return;
      case "unrecognized":
        this.log(`[supervisor] oracle returned unknown action ${JSON.stringify(decision.rawAction)}; ignoring`);
        return;
    }
  }

  private async intervene(decision: InterveneDecision, elapsed: number): Promise<void> {
    this.data.interventions.push({
      time: elapsed,
      reason: "ORACLE_INTERVENTION",
      action: decision.reasoning,
      commands: decision.commands,
      details: decision,
    });
    this.log(`[supervisor] oracle: INTERVENE (${decision.reasoning})`);

    const results: BridgeResult[] = [];
    for (const [i, command] of decision.commands.entries()) {
      this.log(`[supervisor]   command ${i + 1}: ${command}`);
      results.push(await this.bridge.sendCommand(command));
      await this.clock.sleep(this.commandPauseMs, this.signal);
      if (this.interrupted()) break;
    }
    await this.record("intervention.executed", {
      elapsed,
      commands: decision.commands,
      results,
      reasoning: decision.reasoning,
    });
    if (this.state !== "running" || decision.waitSeconds <= 0) return;

    this.log(`[supervisor]   waiting ${decision.waitSeconds}s for the result...`);
    await this.clock.sleep(decision.waitSeconds * 1000, this.signal);
    if (this.interrupted()) return;

    const post = await this.bridge.observeState();
    const postOutput = await this.bridge.getRecentOutput(ERROR_SCAN_LINES);
    const at = elapsed + decision.waitSeconds;
    let followUp: FollowUpDecision;
    try {
      followUp = await this.oracle.followUp(decision, post, postOutput, at);
    } catch (err) {
      const message = errorText(err);
      this.log(`[supervisor] [${at}s] oracle follow-up failed: ${message}`);
      followUp = {
        action: "continue",
        reasoning: `Oracle error: ${message}, continuing`,
        assessment: "Unable to assess intervention results",
        nextConcern: null,
      };
    }
    this.data.decisions.push({ time: at, type: "followup", decision: followUp });
    await this.record("oracle.followup", {
      elapsed: at,
      action: followUp.action,
      reasoning: followUp.reasoning,
      assessment: followUp.assessment,
      next_concern: followUp.nextConcern,
    });
    this.log(`[supervisor] oracle follow-up: ${followUp.assessment || followUp.action}`);

    if (followUp.action === "abort") {
      this.data.issues.push(`[${elapsed}s] ORACLE ABORT after intervention: ${followUp.reasoning}`);
      this.transition("aborted");
      await this.record("run.aborted", { elapsed: at, reasoning: followUp.reasoning, stage: "followup" });
    }
  }

  private interrupted(): boolean {
    if (!this.signal?.aborted) return false;
    if (this.state === "running") {
      this.transition("interrupted");
      this.log("[supervisor] interrupted");
    }
    return true;
  }

  private tornDown = false;

  private async teardown(): Promise<void> {
    if (this.tornDown) return;
    this.tornDown = true;
    if (this.state === "interrupted") {
      await this.record("run.interrupted", { elapsed: this.elapsedSeconds() });
    }
    this.log(`[supervisor] disabling ${this.feature}...`);
    const result = await this.bridge.setAutomation(this.feature, false);
    if (result.success !== true) {
      const detail = result.error ?? "bridge did not confirm";
      this.data.issues.push(`Teardown failed: could not disable ${this.feature}: ${detail}`);
      this.log(`[supervisor] failed to disable ${this.feature}: ${detail}`);
    }
    await this.record("run.teardown", { feature: this.feature, result });
  }

  private async finish(): Promise<SupervisionReport> {
    const durationSeconds = this.elapsedSeconds();
    const verdict = computeVerdict(this.data);
    const state = this.state === "running" ? "completed" : this.state;

    this.log(`[supervisor] run ${state} after ${durationSeconds}s: cycles=${this.data.cycles} kills=${this.data.monstersKilled} ` +
      `decisions=${this.data.decisions.length} interventions=${this.data.interventions.length} issues=${this.data.issues.length}`);
    this.log(verdict.passed ? "[supervisor] PASSED" : `[supervisor] FAILED: ${verdict.failureReason}`);

    let analysis: string | undefined;
    if (!verdict.passed && this.analysisOracle) {
      this.log("[supervisor] asking for a failure analysis...");
      try {
        analysis = await this.analysisOracle.analyzeFailure(
          buildFailureDescription(this.feature, this.data),
          buildAnalysisContext(durationSeconds, this.data)
        );
      } catch (err) {
        analysis = `Failure analysis unavailable: ${errorText(err)}`;
      }
      await this.record("run.analysis", { length: analysis.length });
    }

    const report: SupervisionReport = {
      kind: "supervision",
      test: this.testName,
      feature: this.feature,
      durationSeconds,
      state,
      passed: verdict.passed,
      failureReason: verdict.failureReason,
      issues: [...this.data.issues],
      monitoring: structuredClone(this.data),
      stats: buildStats(this.data),
      ...(analysis !== undefined ? { analysis } : {}),
      ...(this.usage ? { usage: this.usage.getSummary() } : {}),
    };
    await this.record("run.completed", {
      state,
      passed: report.passed,
      failure_reason: report.failureReason,
      stats: { ...report.stats },
    });
    return report;
  }

  private elapsedSeconds(): number {
    return Math.floor((this.clock.now() - this.startedAt) / 1000);
  }

  private transition(next: RunState): void {
    const allowed = VALID_TRANSITIONS[this.state];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid run transition: ${this.state} → ${next}`);
    }
    this.state = next;
  }

  private async record(type: JournalEventType, payload: Record<string, unknown>): Promise<void> {
    await this.journal?.tryEmit(this.runId, type, payload);
  }
}

function describeDecision(decision: Decision): Record<string, unknown> {
  const base = { action: decision.action, reasoning: decision.reasoning, assessment: decision.assessment };
  switch (decision.action) {
    case "intervene":
      return { ...base, commands: decision.commands, wait_seconds: decision.waitSeconds };
    case "unrecognized":
      return { ...base, raw_action: decision.rawAction };
    default:
      return base;
  }
}

/** Convenience wrapper: build a Supervisor and run it. */
export function runSupervisedSession(
  bridge: SupervisionBridge,
  oracle: SupervisionOracle,
  config: SupervisionConfig
): Promise<SupervisionResult> {
  return new Supervisor(bridge, oracle, config).run();
}
