#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { BridgeClient } from "@mudprobe/bridge";
import { Journal } from "@mudprobe/journal";
import { DecisionOracle, PromptArchive, UsageAccumulator } from "@mudprobe/oracle";
import { ConfigError } from "./errors.js";
import { parsePositiveInt, resolveConfig, resolveJournalPath } from "./config.js";
import type { CliConfig, CliOptions } from "./config.js";
import { createModelCall, MODEL_PRICING } from "./llm-adapters.js";
import { loadFeatureInstructions, loadGameContext } from "./instructions.js";
import {
  EXIT_FAILED,
  EXIT_INTERRUPTED,
  runCustomTest,
  runFeatureTest,
  runSupervision,
  verifyJournal,
} from "./commands.js";
import type { CommandServices } from "./commands.js";
import { routeSignals } from "./signals.js";

// Global error handlers — prevent silent crashes from unhandled rejections/exceptions
process.on("unhandledRejection", (reason) => {
  console.error("[mudprobe] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[mudprobe] Uncaught exception:", err);
  process.exit(1);
});

const log = (line: string) => console.log(line);

async function createServices(config: CliConfig, journal: Journal, signal: AbortSignal): Promise<CommandServices> {
  const gameContext = config.gameContextPath ? await loadGameContext(config.gameContextPath) : undefined;
  if (gameContext) log(`[mudprobe] loaded game context from ${config.gameContextPath}`);
  const archive = config.promptsDir ? new PromptArchive(config.promptsDir) : undefined;
  const usage = new UsageAccumulator(MODEL_PRICING);
  const shared = {
    usage,
    ...(archive ? { archive } : {}),
    ...(gameContext ? { gameContext } : {}),
    log,
  };
  const base = config.baseURL ? { baseURL: config.baseURL } : {};

  log(`[mudprobe] provider=${config.provider} monitor=${config.monitorModel} analysis=${config.analysisModel} bridge=${config.bridgeUrl}`);
  return {
    bridge: new BridgeClient({ url: config.bridgeUrl }),
    oracle: new DecisionOracle({
      call: createModelCall({ provider: config.provider, model: config.monitorModel, ...base }),
      ...shared,
    }),
    analysisOracle: new DecisionOracle({
      call: createModelCall({ provider: config.provider, model: config.analysisModel, ...base }),
      ...shared,
    }),
    usage,
    journal,
    resultsDir: config.resultsDir,
    ...(config.output ? { output: config.output } : {}),
    signal,
    log,
  };
}

/**
 * Shared lifecycle of the run commands: config, journal, signal routing,
 * exit code. The first SIGINT or SIGTERM asks the run to wind down; a second
 * one quits.
 */
async function execute(opts: CliOptions, body: (services: CommandServices) => Promise<number>): Promise<never> {
  let code: number;
  let journal: Journal | undefined;
  const controller = new AbortController();
  const unroute = routeSignals(controller, { forceExit: () => process.exit(EXIT_INTERRUPTED), log });

  try {
    const config = resolveConfig(opts);
    journal = new Journal(config.journalPath);
    await journal.init();
    if (config.trace) {
      journal.on((event) => log(`[journal] #${event.seq ?? "?"} ${event.type}`));
    }
    const services = await createServices(config, journal, controller.signal);
    code = await body(services);
    if (services.usage) {
      const summary = services.usage.getSummary();
      log(`[mudprobe] oracle usage: ${summary.call_count} call(s), ${summary.total_tokens} tokens, $${summary.total_cost_usd.toFixed(4)}`);
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[mudprobe] ${err.message}`);
    } else {
      console.error("[mudprobe] Error running test:", err);
    }
    code = EXIT_FAILED;
  } finally {
    unroute();
  }
  if (journal) {
    await journal.close().catch((err: unknown) => console.error("[mudprobe] journal close failed:", err));
  }
  process.exit(code);
}

function withSharedOptions(cmd: Command): Command {
  return cmd
    .option("--bridge-url <url>", "Game client bridge URL (env MUDPROBE_BRIDGE_URL)")
    .option("--provider <name>", "Model provider: openai, claude, local, mock (env MUDPROBE_PROVIDER)")
    .option("--model <name>", "Monitoring model (env MUDPROBE_MODEL)")
    .option("--analysis-model <name>", "Planning and analysis model (env MUDPROBE_ANALYSIS_MODEL)")
    .option("--base-url <url>", "OpenAI-compatible endpoint (env OPENAI_BASE_URL)")
    .option("--output <file>", "Write the report here instead of the results directory")
    .option("--results-dir <dir>", "Results directory (env MUDPROBE_RESULTS_DIR)")
    .option("--prompts-dir <dir>", "Archive every oracle prompt in this directory")
    .option("--game-context <file>", "Markdown file describing game mechanics (env MUDPROBE_GAME_CONTEXT)")
    .option("--trace", "Print journal events as they are recorded");
}

const program = new Command();
program.name("mudprobe").description("Oracle-supervised test runs against a MUD game client").version("0.1.0");

withSharedOptions(
  program.command("feature").description("Single-shot test of a feature with built-in instructions")
    .argument("[name]", "Feature name", "AutoGong")
).action(async (name: string, opts: CliOptions) => {
  await execute(opts, async (services) => {
    const instructions = await loadFeatureInstructions(name);
    return runFeatureTest(services, name, instructions);
  });
});

withSharedOptions(
  program.command("supervise").description("Extended run watched by the oracle")
    .option("--feature <name>", "Automation feature to enable", "autogong")
    .option("--duration <s>", "Run length in seconds", "240")
    .option("--interval <s>", "Seconds between oracle consultations", "10")
).action(async (opts: CliOptions & { feature: string; duration: string; interval: string }) => {
  await execute(opts, (services) =>
    runSupervision(services, {
      feature: opts.feature,
      durationSeconds: parsePositiveInt(opts.duration, "duration"),
      intervalSeconds: parsePositiveInt(opts.interval, "interval"),
    })
  );
});

withSharedOptions(
  program.command("custom").description("Single-shot test planned from a free-form prompt")
    .option("--feature <name>", "Feature name", "Custom Feature")
    .requiredOption("--prompt <text>", "What to test")
).action(async (opts: CliOptions & { feature: string; prompt: string }) => {
  await execute(opts, (services) => runCustomTest(services, opts.feature, opts.prompt));
});

program.command("verify-journal").description("Check the journal hash chain")
  .option("--journal <file>", "Journal path (env MUDPROBE_JOURNAL_PATH)")
  .action(async (opts: { journal?: string }) => {
    const journal = new Journal(resolveJournalPath(opts.journal), { lock: false });
    process.exit(await verifyJournal(journal, log));
  });

program.parse();
