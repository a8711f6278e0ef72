import type { FeatureTestReport, SupervisionResult } from "@mudprobe/schemas";
import type { Journal } from "@mudprobe/journal";
import type { UsageAccumulator } from "@mudprobe/oracle";
import { Supervisor, TestExecutor } from "@mudprobe/runner";
import type {
  AnalysisOracle,
  Clock,
  ExecutorBridge,
  ExecutorOracle,
  SupervisionBridge,
  SupervisionOracle,
} from "@mudprobe/runner";
import { slugify } from "./instructions.js";
import { writeBugAnalysis, writeReport } from "./results.js";
import type { ResultTarget } from "./results.js";

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 130;

/** Everything a run command needs, built once by the entry point. */
export interface CommandServices {
  bridge: SupervisionBridge & ExecutorBridge;
  /** Monitoring model: consultations, follow-ups, step verification. */
  oracle: SupervisionOracle & Pick<ExecutorOracle, "verifyOutput">;
  /** Analysis model: test plans and failure analysis. */
  analysisOracle: AnalysisOracle & Pick<ExecutorOracle, "requestTestPlan">;
  usage?: UsageAccumulator;
  journal?: Journal;
  resultsDir: string;
  output?: string;
  signal?: AbortSignal;
  clock?: Clock;
  now?: () => Date;
  log: (line: string) => void;
}

export interface SuperviseArgs {
  feature: string;
  durationSeconds: number;
  intervalSeconds: number;
}

function isPassed(report: FeatureTestReport | SupervisionResult): boolean {
  return report.kind === "feature" ? report.overallPass : report.passed;
}

function banner(log: (line: string) => void, title: string): void {
  log("=".repeat(60));
  log(title);
  log("=".repeat(60));
}

async function conclude(
  services: CommandServices,
  slug: string,
  report: FeatureTestReport | SupervisionResult
): Promise<number> {
  const { log } = services;
  const now = services.now?.() ?? new Date();
  const target: ResultTarget = {
    dir: services.resultsDir,
    ...(services.output ? { output: services.output } : {}),
    slug,
    timestamp: Math.floor(now.getTime() / 1000),
  };

  const reportPath = await writeReport(report, target);
  banner(log, `Results saved to: ${reportPath}`);

  if (services.signal?.aborted || (report.kind === "supervision" && report.state === "interrupted")) {
    log("[mudprobe] test interrupted by user");
    return EXIT_INTERRUPTED;
  }
  if (isPassed(report)) return EXIT_PASSED;

  let analysis: string;
  if (report.kind === "supervision" && report.analysis !== undefined) {
    analysis = report.analysis;
  } else {
    log("[mudprobe] test failed, generating bug analysis...");
    try {
      analysis = await services.analysisOracle.analyzeFailure(`Test '${slug}' failed`, { ...report });
    } catch (err) {
      log(`[mudprobe] bug analysis failed: ${err instanceof Error ? err.message : String(err)}`);
      return EXIT_FAILED;
    }
  }

  const analysisPath = await writeBugAnalysis(analysis, target, now);
  log(`[mudprobe] bug analysis saved to: ${analysisPath}`);
  log(analysis);
  return EXIT_FAILED;
}

function executor(services: CommandServices): TestExecutor {
  const oracle: ExecutorOracle = {
    requestTestPlan: (request) => services.analysisOracle.requestTestPlan(request),
    verifyOutput: (...args) => services.oracle.verifyOutput(...args),
  };
  return new TestExecutor(services.bridge, oracle, {
    ...(services.clock ? { clock: services.clock } : {}),
    ...(services.journal ? { journal: services.journal } : {}),
    ...(services.usage ? { usage: services.usage } : {}),
    log: services.log,
  });
}

export async function runFeatureTest(services: CommandServices, feature: string, instructions: string): Promise<number> {
  banner(services.log, `Testing feature: ${feature}`);
  const report = await executor(services).testFeature(feature, instructions);
  return conclude(services, slugify(feature), report);
}

export async function runCustomTest(services: CommandServices, feature: string, prompt: string): Promise<number> {
  banner(services.log, `Running custom test: ${feature}`);
  const report = await executor(services).testWithCustomPrompt(feature, prompt);
  return conclude(services, slugify(feature), report);
}

export async function runSupervision(services: CommandServices, args: SuperviseArgs): Promise<number> {
  banner(services.log, `Supervised run of ${args.feature} (${args.durationSeconds}s, oracle every ${args.intervalSeconds}s)`);
  const supervisor = new Supervisor(services.bridge, services.oracle, {
    feature: args.feature,
    durationSeconds: args.durationSeconds,
    checkIntervalSeconds: args.intervalSeconds,
    analysisOracle: services.analysisOracle,
    ...(services.signal ? { signal: services.signal } : {}),
    ...(services.clock ? { clock: services.clock } : {}),
    ...(services.journal ? { journal: services.journal } : {}),
    ...(services.usage ? { usage: services.usage } : {}),
    log: services.log,
  });
  const report = await supervisor.run();
  return conclude(services, `${slugify(args.feature)}-extended`, report);
}

/** Replays the hash chain. Call it before init(), which would cut a broken tail. */
export async function verifyJournal(journal: Journal, log: (line: string) => void): Promise<number> {
  const result = await journal.verifyIntegrity();
  if (result.valid) {
    log(`[mudprobe] journal OK: ${result.count} event(s) in ${journal.getFilePath()}`);
    const [last] = await journal.readAll({ limit: 1 });
    if (last) log(`[mudprobe] last event: ${last.type} (run ${last.session_id}) at ${last.timestamp}`);
    return EXIT_PASSED;
  }
  log(`[mudprobe] journal chain broken at event ${result.brokenAt ?? "?"} of ${result.count}`);
  return EXIT_FAILED;
}
