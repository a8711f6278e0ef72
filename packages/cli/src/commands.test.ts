import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readSnapshot } from "@mudprobe/bridge";
import { Journal } from "@mudprobe/journal";
import { VirtualClock } from "@mudprobe/runner";
import type { BridgeResult, Decision, FollowUpDecision, Snapshot, TestPlan, Verification } from "@mudprobe/schemas";
import {
  EXIT_FAILED,
  EXIT_INTERRUPTED,
  EXIT_PASSED,
  runCustomTest,
  runFeatureTest,
  runSupervision,
  verifyJournal,
} from "./commands.js";
import type { CommandServices } from "./commands.js";
import { routeSignals } from "./signals.js";

const NOW = new Date(1700000000000);

function fakeBridge(enableResult: BridgeResult = { success: true }) {
  return {
    setAutomation: vi.fn(async (_feature: string, enabled: boolean): Promise<BridgeResult> =>
      enabled ? enableResult : { success: true }
    ),
    observeState: vi.fn(async (): Promise<Snapshot> => readSnapshot({ character: { hp: 100, hpPercent: 100 } })),
    getRecentOutput: vi.fn(async (): Promise<string[]> => ["You ring the gong."]),
    sendCommand: vi.fn(async (): Promise<BridgeResult> => ({ success: true })),
    callTool: vi.fn(async (): Promise<BridgeResult> => ({ success: true })),
    waitForOutput: vi.fn(async (): Promise<BridgeResult> => ({ found: false })),
  };
}

function fakeOracle(decision: Decision = { action: "continue", reasoning: "ok", assessment: "" }) {
  return {
    consult: vi.fn(async (): Promise<Decision> => decision),
    followUp: vi.fn(async (): Promise<FollowUpDecision> => ({
      action: "continue",
      reasoning: "",
      assessment: "",
      nextConcern: null,
    })),
    verifyOutput: vi.fn(async (): Promise<Verification> => ({ passed: true, analysis: "", game_evidence: "" })),
  };
}

describe("run commands", () => {
  let dir: string;
  let lines: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mudprobe-cli-"));
    lines = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function services(
    bridge: ReturnType<typeof fakeBridge>,
    oracle: ReturnType<typeof fakeOracle>,
    plan: TestPlan = { steps: [] },
    signal?: AbortSignal
  ) {
    const analysisOracle = {
      analyzeFailure: vi.fn(async (_description: string, _context: Record<string, unknown>): Promise<string> =>
        "## Root Cause\nGong timer stuck."
      ),
      requestTestPlan: vi.fn(async (): Promise<TestPlan> => plan),
    };
    const built: CommandServices = {
      bridge,
      oracle,
      analysisOracle,
      resultsDir: dir,
      clock: new VirtualClock(),
      now: () => NOW,
      log: (line) => lines.push(line),
      ...(signal ? { signal } : {}),
    };
    return { built, analysisOracle };
  }

  it("writes the report of a passing feature test and exits 0", async () => {
    const bridge = fakeBridge();
    const { built, analysisOracle } = services(bridge, fakeOracle(), {
      steps: [{ action: "observe_game_state", expected: "state" }],
    });

    expect(await runFeatureTest(built, "AutoGong", "Enable it.")).toBe(EXIT_PASSED);

    const report: unknown = JSON.parse(await readFile(join(dir, "test_results_autogong_1700000000.json"), "utf-8"));
    expect(report).toMatchObject({ kind: "feature", feature: "AutoGong", overallPass: true });
    expect(analysisOracle.requestTestPlan).toHaveBeenCalledTimes(1);
    expect(analysisOracle.analyzeFailure).not.toHaveBeenCalled();
    expect(await readdir(dir)).toEqual(["test_results_autogong_1700000000.json"]);
  });

  it("asks for a bug analysis when a custom test fails", async () => {
    const bridge = fakeBridge();
    bridge.callTool.mockResolvedValue({ error: "Not connected" });
    const { built, analysisOracle } = services(bridge, fakeOracle(), {
      steps: [{ action: "send_command", params: { command: "kill rat" }, expected: "attack" }],
    });

    expect(await runCustomTest(built, "Combat System", "Attack the rat")).toBe(EXIT_FAILED);

    expect(analysisOracle.analyzeFailure).toHaveBeenCalledTimes(1);
    const [description, context] = analysisOracle.analyzeFailure.mock.calls[0] ?? [];
    expect(description).toBe("Test 'combat-system' failed");
    expect(context).toMatchObject({ kind: "feature", overallPass: false, customPrompt: "Attack the rat" });
    expect(await readFile(join(dir, "bug_analysis_combat-system_1700000000.md"), "utf-8")).toMatch(
      /^# Bug Analysis: combat-system\n\nGenerated: .+\n\n## Root Cause\nGong timer stuck\.$/
    );
    expect(lines).toContain("## Root Cause\nGong timer stuck.");
  });

  it("still exits 1 when the bug analysis itself fails", async () => {
    const { built, analysisOracle } = services(fakeBridge(), fakeOracle());
    analysisOracle.requestTestPlan.mockRejectedValue(new Error("401 Unauthorized"));
    analysisOracle.analyzeFailure.mockRejectedValue(new Error("rate limited"));

    expect(await runFeatureTest(built, "AutoGong", "x")).toBe(EXIT_FAILED);
    expect(lines).toContain("[mudprobe] bug analysis failed: rate limited");
    expect(await readdir(dir)).toEqual(["test_results_autogong_1700000000.json"]);
  });

  it("supervises a quiet run to a pass", async () => {
    const bridge = fakeBridge();
    const { built } = services(bridge, fakeOracle());

    const code = await runSupervision(built, { feature: "autogong", durationSeconds: 10, intervalSeconds: 10 });

    expect(code).toBe(EXIT_PASSED);
    const report: unknown = JSON.parse(await readFile(join(dir, "test_results_autogong-extended_1700000000.json"), "utf-8"));
    expect(report).toMatchObject({ kind: "supervision", test: "extended_autogong", state: "completed", passed: true });
    expect(bridge.setAutomation.mock.calls).toEqual([["autogong", true], ["autogong", false]]);
  });

  it("reuses the run's own analysis after an oracle abort", async () => {
    const oracle = fakeOracle({ action: "abort", reasoning: "HP critical", assessment: "" });
    const { built, analysisOracle } = services(fakeBridge(), oracle);

    const code = await runSupervision(built, { feature: "autogong", durationSeconds: 15, intervalSeconds: 10 });

    expect(code).toBe(EXIT_FAILED);
    expect(analysisOracle.analyzeFailure).toHaveBeenCalledTimes(1);
    expect(analysisOracle.analyzeFailure.mock.calls[0]?.[0]).toContain("autogong");
    expect(await readFile(join(dir, "bug_analysis_autogong-extended_1700000000.md"), "utf-8")).toContain(
      "## Root Cause\nGong timer stuck."
    );
  });

  it("analyses a setup failure", async () => {
    const { built, analysisOracle } = services(fakeBridge({ success: false, error: "Unknown feature" }), fakeOracle());

    expect(await runSupervision(built, { feature: "autogong", durationSeconds: 10, intervalSeconds: 10 })).toBe(EXIT_FAILED);
    expect(analysisOracle.analyzeFailure).toHaveBeenCalledWith(
      "Test 'autogong-extended' failed",
      expect.objectContaining({ kind: "setup_failed", error: "Failed to enable autogong" })
    );
  });

  it("exits 130 after an interrupt, with teardown done and no analysis", async () => {
    const controller = new AbortController();
    controller.abort();
    const bridge = fakeBridge();
    const { built, analysisOracle } = services(bridge, fakeOracle(), undefined, controller.signal);

    const code = await runSupervision(built, { feature: "autogong", durationSeconds: 240, intervalSeconds: 10 });

    expect(code).toBe(EXIT_INTERRUPTED);
    expect(bridge.setAutomation).toHaveBeenLastCalledWith("autogong", false);
    expect(analysisOracle.analyzeFailure).not.toHaveBeenCalled();
    expect(lines).toContain("[mudprobe] test interrupted by user");
  });

  it("winds a supervised run down on SIGTERM instead of exiting", async () => {
    const controller = new AbortController();
    const forceExit = vi.fn();
    const before = process.listeners("SIGTERM");
    const unroute = routeSignals(controller, { forceExit });
    const onTerm = process.listeners("SIGTERM").find((l) => !before.includes(l));
    const oracle = fakeOracle();
    oracle.consult.mockImplementationOnce(async (): Promise<Decision> => {
      onTerm?.("SIGTERM");
      return { action: "continue", reasoning: "ok", assessment: "" };
    });
    const bridge = fakeBridge();
    const { built } = services(bridge, oracle, undefined, controller.signal);

    try {
      const code = await runSupervision(built, { feature: "autogong", durationSeconds: 240, intervalSeconds: 10 });

      expect(code).toBe(EXIT_INTERRUPTED);
      expect(oracle.consult).toHaveBeenCalledTimes(1);
      expect(bridge.setAutomation.mock.calls).toEqual([["autogong", true], ["autogong", false]]);
      expect(forceExit).not.toHaveBeenCalled();
    } finally {
      unroute();
    }
  });
});

describe("verifyJournal", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mudprobe-verify-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports an intact chain and a broken one", async () => {
    const path = join(dir, "events.jsonl");
    const writer = new Journal(path, { fsync: false, lock: false });
    await writer.init();
    await writer.emit("run-1", "run.started", { feature: "autogong" });
    await writer.emit("run-1", "run.tick", { elapsed: 5 });
    await writer.emit("run-1", "run.completed", { passed: true });
    await writer.close();

    const lines: string[] = [];
    const log = (line: string) => lines.push(line);
    expect(await verifyJournal(new Journal(path, { lock: false }), log)).toBe(EXIT_PASSED);
    expect(lines[0]).toBe(`[mudprobe] journal OK: 3 event(s) in ${path}`);
    expect(lines[1]).toMatch(/^\[mudprobe\] last event: run\.completed \(run run-1\) at \d{4}-\d{2}-\d{2}T/);

    const content = (await readFile(path, "utf-8")).split("\n");
    content[1] = (content[1] ?? "").replace('"elapsed":5', '"elapsed":6');
    await writeFile(path, content.join("\n"), "utf-8");

    expect(await verifyJournal(new Journal(path, { lock: false }), log)).toBe(EXIT_FAILED);
    expect(lines[2]).toBe("[mudprobe] journal chain broken at event 2 of 3");
    expect(lines).toHaveLength(3);
  });
});
