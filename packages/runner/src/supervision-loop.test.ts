import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readSnapshot } from "@mudprobe/bridge";
import { Journal } from "@mudprobe/journal";
import { DecisionOracle } from "@mudprobe/oracle";
import type { ModelCallFn } from "@mudprobe/oracle";
import type { BridgeResult, Decision, FollowUpDecision, Snapshot, SupervisionResult, SupervisionReport } from "@mudprobe/schemas";
import { VirtualClock } from "./clock.js";
import { Supervisor, runSupervisedSession } from "./supervision-loop.js";
import type { SupervisionBridge, SupervisionOracle } from "./supervision-loop.js";

function snap(monsters: string[] = [], hp = 100): Snapshot {
  return readSnapshot({
    character: { hp, maxHp: 100, hpPercent: hp },
    location: { roomName: "Gong Room", monsters },
    combat: { inCombat: false, targetedMonster: null },
    automation: { autoGong: true, autoAttack: false, autoShield: false },
  });
}

interface FakeBridgeOptions {
  snapshots?: Snapshot[];
  output?: string[];
  enable?: BridgeResult;
  disable?: BridgeResult;
  onObserve?: (call: number) => void;
}

function fakeBridge(options: FakeBridgeOptions = {}) {
  const snapshots = options.snapshots ?? [snap()];
  let observed = 0;
  const bridge = {
    setAutomation: vi.fn(async (_feature: string, enabled: boolean): Promise<BridgeResult> =>
      enabled ? options.enable ?? { success: true } : options.disable ?? { success: true }
    ),
    observeState: vi.fn(async (): Promise<Snapshot> => {
      const index = Math.min(observed, snapshots.length - 1);
      options.onObserve?.(observed);
      observed++;
      return snapshots[index] ?? snap();
    }),
    getRecentOutput: vi.fn(async (): Promise<string[]> => options.output ?? []),
    sendCommand: vi.fn(async (command?: string): Promise<BridgeResult> => ({ success: true, command })),
  } satisfies SupervisionBridge;
  return bridge;
}

function fakeOracle(decisions: Decision[], followUps: FollowUpDecision[] = []) {
  const oracle = {
    consult: vi.fn(async (): Promise<Decision> =>
      decisions.shift() ?? { action: "continue", reasoning: "steady", assessment: "ok" }
    ),
    followUp: vi.fn(async (): Promise<FollowUpDecision> =>
      followUps.shift() ?? { action: "continue", reasoning: "fine", assessment: "ok", nextConcern: null }
    ),
  } satisfies SupervisionOracle;
  return oracle;
}

function supervision(result: SupervisionResult): SupervisionReport {
  if (result.kind !== "supervision") throw new Error(`expected a supervision report, got ${result.kind}`);
  return result;
}

const quiet = () => {};

function teardownCalls(bridge: ReturnType<typeof fakeBridge>): number {
  return bridge.setAutomation.mock.calls.filter(([, enabled]) => enabled === false).length;
}

describe("Supervisor", () => {
  let clock: VirtualClock;

  beforeEach(() => {
    clock = new VirtualClock();
  });

  it("counts a goblin spawn and kill over two ticks without consulting", async () => {
    const bridge = fakeBridge({ snapshots: [snap(), snap(["goblin"]), snap()] });
    const oracle = fakeOracle([]);

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 10,
      checkIntervalSeconds: 10,
      clock,
      log: quiet,
    }));

    expect(bridge.observeState).toHaveBeenCalledTimes(3);
    expect(oracle.consult).not.toHaveBeenCalled();
    expect(report).toMatchObject({
      kind: "supervision",
      test: "extended_autogong",
      feature: "autogong",
      state: "completed",
      durationSeconds: 10,
      passed: true,
      failureReason: null,
      issues: [],
    });
    expect(report.stats).toEqual({
      cycles: 1,
      kills: 1,
      combatEvents: 0,
      hpChanges: 0,
      errors: 0,
      decisions: 0,
      interventions: 0,
    });
    expect(teardownCalls(bridge)).toBe(1);
  });

  it("aborts at the first consultation and still tears down", async () => {
    const bridge = fakeBridge();
    const oracle = fakeOracle([{ action: "abort", reasoning: "HP critical", assessment: "danger" }]);

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 60,
      clock,
      log: quiet,
    }));

    expect(oracle.consult).toHaveBeenCalledTimes(1);
    expect(report.state).toBe("aborted");
    expect(report.passed).toBe(false);
    expect(report.issues).toEqual(["[10s] ORACLE ABORT: HP critical"]);
    expect(report.failureReason).toBe("1 oracle intervention(s) required");
    expect(report.monitoring.interventions).toEqual([
      {
        time: 10,
        reason: "ORACLE_ABORT",
        action: "HP critical",
        details: { action: "abort", reasoning: "HP critical", assessment: "danger" },
      },
    ]);
    expect(teardownCalls(bridge)).toBe(1);
  });

  it("sends an intervention command once and skips the follow-up for a zero wait", async () => {
    const bridge = fakeBridge();
    const oracle = fakeOracle([
      { action: "intervene", reasoning: "HP dropping", assessment: "risky", commands: ["stop"], waitSeconds: 0 },
    ]);

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 15,
      clock,
      log: quiet,
    }));

    expect(bridge.sendCommand).toHaveBeenCalledTimes(1);
    expect(bridge.sendCommand).toHaveBeenCalledWith("stop");
    expect(oracle.followUp).not.toHaveBeenCalled();
    expect(report.state).toBe("completed");
    expect(report.passed).toBe(false);
    expect(report.failureReason).toBe("1 oracle intervention(s) required");
    expect(report.monitoring.interventions[0]).toMatchObject({
      time: 10,
      reason: "ORACLE_INTERVENTION",
      action: "HP dropping",
      commands: ["stop"],
    });
  });

  it("waits after an intervention and aborts when the follow-up says so", async () => {
    const bridge = fakeBridge();
    const oracle = fakeOracle(
      [{ action: "intervene", reasoning: "HP low", assessment: "risky", commands: ["stop", "look"], waitSeconds: 5 }],
      [{ action: "abort", reasoning: "still dropping", assessment: "failed", nextConcern: null }]
    );

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 60,
      clock,
      log: quiet,
    }));

    expect(bridge.sendCommand.mock.calls.map(([c]) => c)).toEqual(["stop", "look"]);
    expect(oracle.followUp).toHaveBeenCalledTimes(1);
    expect(oracle.followUp.mock.calls[0]).toEqual([
      { action: "intervene", reasoning: "HP low", assessment: "risky", commands: ["stop", "look"], waitSeconds: 5 },
      snap(),
      [],
      15,
    ]);
    expect(report.state).toBe("aborted");
    expect(report.monitoring.decisions.map((d) => [d.time, d.type, d.decision.action])).toEqual([
      [10, "periodic", "intervene"],
      [15, "followup", "abort"],
    ]);
    expect(report.issues).toEqual(["[10s] ORACLE ABORT after intervention: still dropping"]);
    // 10s of ticks + 2 command pauses + 5s wait
    expect(report.durationSeconds).toBe(17);
    expect(teardownCalls(bridge)).toBe(1);
  });

  it("keeps going on an unrecognized action", async () => {
    const bridge = fakeBridge();
    const oracle = fakeOracle([{ action: "unrecognized", reasoning: "", assessment: "", rawAction: "dance" }]);
    const log = vi.fn();

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 20,
      clock,
      log,
    }));

    expect(report.state).toBe("completed");
    expect(report.passed).toBe(true);
    expect(log).toHaveBeenCalledWith('[supervisor] oracle returned unknown action "dance"; ignoring');
  });

  it("survives malformed oracle JSON with a default continue", async () => {
    const bridge = fakeBridge();
    const call = vi.fn<ModelCallFn>().mockResolvedValue({ text: "sure, keep going!" });
    const oracle = new DecisionOracle({ call, log: quiet });

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 30,
      clock,
      log: quiet,
    }));

    expect(report.state).toBe("completed");
    expect(report.passed).toBe(true);
    expect(report.durationSeconds).toBe(30);
    expect(report.monitoring.decisions.map((d) => d.time)).toEqual([10, 20]);
    for (const record of report.monitoring.decisions) {
      expect(record.decision.action).toBe("continue");
      expect(record.decision.reasoning).toMatch(/^Oracle error: /);
    }
  });

  it("stops at tick granularity when interrupted and tears down once", async () => {
    const controller = new AbortController();
    const bridge = fakeBridge({ onObserve: (call) => { if (call === 2) controller.abort(); } });
    const oracle = fakeOracle([]);

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 240,
      clock,
      signal: controller.signal,
      log: quiet,
    }));

    expect(report.state).toBe("interrupted");
    expect(report.durationSeconds).toBe(10);
    expect(bridge.observeState).toHaveBeenCalledTimes(3);
    expect(teardownCalls(bridge)).toBe(1);
  });

  it("cuts an intervention wait short on interrupt", async () => {
    const controller = new AbortController();
    const bridge = fakeBridge();
    bridge.sendCommand.mockImplementation(async (command?: string) => {
      controller.abort();
      return { success: true, command };
    });
    const oracle = fakeOracle([
      { action: "intervene", reasoning: "HP low", assessment: "", commands: ["stop", "flee"], waitSeconds: 30 },
    ]);

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 240,
      clock,
      signal: controller.signal,
      log: quiet,
    }));

    expect(report.state).toBe("interrupted");
    expect(bridge.sendCommand).toHaveBeenCalledTimes(1);
    expect(oracle.followUp).not.toHaveBeenCalled();
    expect(report.durationSeconds).toBe(10);
    expect(teardownCalls(bridge)).toBe(1);
  });

  it("records a fault, tears down and reports", async () => {
    const bridge = fakeBridge();
    bridge.getRecentOutput.mockRejectedValueOnce(new Error("boom"));
    const oracle = fakeOracle([]);

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 60,
      clock,
      log: quiet,
    }));

    expect(report.state).toBe("faulted");
    expect(report.issues).toEqual(["[5s] FAULT: boom"]);
    expect(report.failureReason).toBe("1 issue(s) detected");
    expect(teardownCalls(bridge)).toBe(1);
  });

  it("keeps running when the oracle itself rejects a consultation", async () => {
    const bridge = fakeBridge();
    const oracle = fakeOracle([]);
    oracle.consult.mockRejectedValue(new Error("ECONNRESET"));

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 30,
      clock,
      log: quiet,
    }));

    expect(oracle.consult).toHaveBeenCalledTimes(2);
    expect(report.state).toBe("completed");
    expect(report.passed).toBe(true);
    expect(report.issues).toEqual([]);
    expect(report.monitoring.decisions[0]).toEqual({
      time: 10,
      type: "periodic",
      decision: {
        action: "continue",
        reasoning: "Oracle error: ECONNRESET, continuing cautiously",
        assessment: "Oracle consultation failed",
      },
    });
    expect(teardownCalls(bridge)).toBe(1);
  });

  it("treats a rejected follow-up as continue", async () => {
    const bridge = fakeBridge();
    const oracle = fakeOracle([
      { action: "intervene", commands: ["stop"], waitSeconds: 5, reasoning: "HP low", assessment: "" },
    ]);
    oracle.followUp.mockRejectedValue(new Error("timeout"));

    const report = supervision(await runSupervisedSession(bridge, oracle, {
      feature: "autogong",
      durationSeconds: 30,
      clock,
      log: quiet,
    }));

    expect(report.state).toBe("completed");
    expect(report.issues).toEqual([]);
    expect(report.failureReason).toBe("1 oracle intervention(s) required");
    expect(report.monitoring.decisions[1]).toEqual({
      time: 15,
      type: "followup",
      decision: {
        action: "continue",
        reasoning: "Oracle error: timeout, continuing",
        assessment: "Unable to assess intervention results",
        nextConcern: null,
      },
    });
  });

  it("returns a setup failure without starting or tearing down", async () => {
    const bridge = fakeBridge({ enable: { error: "not connected" } });
    const oracle = fakeOracle([]);

    const result = await runSupervisedSession(bridge, oracle, { feature: "autogong", durationSeconds: 60, clock, log: quiet });

    expect(result).toEqual({
      kind: "setup_failed",
      test: "extended_autogong",
      feature: "autogong",
      passed: false,
      error: "Failed to enable autogong",
      result: { error: "not connected" },
    });
    expect(bridge.setAutomation).toHaveBeenCalledTimes(1);
    expect(bridge.observeState).not.toHaveBeenCalled();
  });

  it("records a failed teardown as an issue", async () => {
    const bridge = fakeBridge({ disable: { error: "bridge offline" } });
    const report = supervision(await runSupervisedSession(bridge, fakeOracle([]), {
      feature: "autogong",
      durationSeconds: 5,
      clock,
      log: quiet,
    }));

    expect(report.issues).toEqual(["Teardown failed: could not disable autogong: bridge offline"]);
    expect(report.passed).toBe(false);
    expect(report.failureReason).toBe("1 issue(s) detected");
  });

  it("turns game errors in output into issues", async () => {
    const bridge = fakeBridge({ output: ["You can't afford to ring the gong!"] });
    const report = supervision(await runSupervisedSession(bridge, fakeOracle([]), {
      feature: "autogong",
      durationSeconds: 10,
      clock,
      log: quiet,
    }));

    expect(report.monitoring.errors).toEqual([{ time: 5, message: "You can't afford to ring the gong!" }]);
    expect(report.issues).toEqual(["[5s] ERROR: You can't afford to ring the gong!..."]);
    expect(report.failureReason).toBe("1 issue(s) detected");
  });

  it("attaches a failure analysis, or the reason it is missing", async () => {
    const failing = () => fakeBridge({ output: ["Invalid command."] });

    const analyst = { analyzeFailure: vi.fn(async () => "## Root Cause\nGong timer stuck.") };
    const analysed = supervision(await runSupervisedSession(failing(), fakeOracle([]), {
      feature: "autogong",
      durationSeconds: 5,
      clock: new VirtualClock(),
      analysisOracle: analyst,
      log: quiet,
    }));
    expect(analysed.analysis).toBe("## Root Cause\nGong timer stuck.");
    expect(analyst.analyzeFailure).toHaveBeenCalledWith(
      "1 issue(s) detected during test",
      expect.objectContaining({ test_duration: 5, issues: ["[5s] ERROR: Invalid command...."] })
    );

    const broken = { analyzeFailure: vi.fn(async (): Promise<string> => { throw new Error("rate limited"); }) };
    const unanalysed = supervision(await runSupervisedSession(failing(), fakeOracle([]), {
      feature: "autogong",
      durationSeconds: 5,
      clock: new VirtualClock(),
      analysisOracle: broken,
      log: quiet,
    }));
    expect(unanalysed.analysis).toBe("Failure analysis unavailable: rate limited");
    expect(unanalysed.passed).toBe(false);
  });

  it("refuses a second concurrent run", async () => {
    const supervisor = new Supervisor(fakeBridge(), fakeOracle([]), {
      feature: "autogong",
      durationSeconds: 5,
      clock,
      log: quiet,
    });
    const first = supervisor.run();
    await expect(supervisor.run()).rejects.toThrow("already running");
    await first;
  });

  describe("with a journal", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "mudprobe-run-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes the run's events in order", async () => {
      const journal = new Journal(join(dir, "events.jsonl"), { fsync: false, lock: false });
      await journal.init();
      const bridge = fakeBridge({ snapshots: [snap(), snap(["goblin"]), snap()] });

      await runSupervisedSession(bridge, fakeOracle([]), {
        feature: "autogong",
        durationSeconds: 10,
        clock,
        journal,
        runId: "run-1",
        log: quiet,
      });

      expect(journal.readSession("run-1").map((e) => e.type)).toEqual([
        "run.started",
        "run.tick",
        "run.monsters_changed",
        "run.tick",
        "run.monsters_changed",
        "run.teardown",
        "run.completed",
      ]);
      expect((await journal.verifyIntegrity()).valid).toBe(true);
      await journal.close();
    });
  });
});
