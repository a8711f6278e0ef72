import { resolve } from "node:path";
import { DEFAULT_BRIDGE_URL } from "@mudprobe/bridge";
import { ConfigError } from "./errors.js";
import { ANALYSIS_MODEL_DEFAULTS, MONITOR_MODEL_DEFAULTS, resolveProvider } from "./llm-adapters.js";
import type { Provider } from "./llm-adapters.js";

/** Options shared by every run command, as commander hands them over. */
export interface CliOptions {
  bridgeUrl?: string;
  provider?: string;
  model?: string;
  analysisModel?: string;
  baseUrl?: string;
  output?: string;
  resultsDir?: string;
  promptsDir?: string;
  gameContext?: string;
  trace?: boolean;
}

export interface CliConfig {
  bridgeUrl: string;
  provider: Provider;
  monitorModel: string;
  analysisModel: string;
  baseURL?: string;
  output?: string;
  resultsDir: string;
  promptsDir?: string;
  gameContextPath?: string;
  journalPath: string;
  trace: boolean;
}

export function parsePositiveInt(value: string, label: string, fallback?: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    if (fallback !== undefined) return fallback;
    throw new ConfigError(`Invalid ${label}: "${value}" (must be a positive integer)`);
  }
  return n;
}

function checkUrl(value: string, label: string): string {
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`Invalid ${label}: "${value}"`);
  }
  return value;
}

export function resolveJournalPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return resolve(explicit ?? env.MUDPROBE_JOURNAL_PATH ?? "journal/events.jsonl");
}

/** Flags win over the environment, the environment over defaults. */
export function resolveConfig(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): CliConfig {
  const provider = resolveProvider(opts.provider, env);
  const baseURL = opts.baseUrl ?? env.OPENAI_BASE_URL;
  const gameContextPath = opts.gameContext ?? env.MUDPROBE_GAME_CONTEXT;
  return {
    bridgeUrl: checkUrl(opts.bridgeUrl ?? env.MUDPROBE_BRIDGE_URL ?? DEFAULT_BRIDGE_URL, "bridge URL"),
    provider,
    monitorModel: opts.model ?? env.MUDPROBE_MODEL ?? MONITOR_MODEL_DEFAULTS[provider],
    analysisModel: opts.analysisModel ?? env.MUDPROBE_ANALYSIS_MODEL ?? ANALYSIS_MODEL_DEFAULTS[provider],
    ...(baseURL ? { baseURL: checkUrl(baseURL, "base URL") } : {}),
    ...(opts.output ? { output: resolve(opts.output) } : {}),
    resultsDir: resolve(opts.resultsDir ?? env.MUDPROBE_RESULTS_DIR ?? "results"),
    ...(opts.promptsDir ? { promptsDir: resolve(opts.promptsDir) } : {}),
    ...(gameContextPath ? { gameContextPath: resolve(gameContextPath) } : {}),
    journalPath: resolveJournalPath(undefined, env),
    trace: opts.trace === true,
  };
}
