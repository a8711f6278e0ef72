import type { ModelCallFn, ModelCallOptions, ModelCallResult, ModelPricing } from "@mudprobe/oracle";
import { ConfigError } from "./errors.js";

const MAX_RETRIES = 3;
const BASE_DELAY_MS = 500;

export const PROVIDERS = ["openai", "claude", "local", "mock"] as const;
export type Provider = (typeof PROVIDERS)[number];

export const LOCAL_BASE_URL = "http://localhost:1234/v1";

/** Frequent, cheap calls: consultations, follow-ups, step verification. */
export const MONITOR_MODEL_DEFAULTS: Record<Provider, string> = {
  openai: "gpt-5-mini",
  claude: "claude-haiku-4-5",
  local: "gpt-oss-20b",
  mock: "mock",
};

/** Rare, heavier calls: test plans and failure analysis. */
export const ANALYSIS_MODEL_DEFAULTS: Record<Provider, string> = {
  openai: "gpt-5-codex",
  claude: "claude-sonnet-4-5",
  local: "gpt-oss-20b",
  mock: "mock",
};

/** List prices of the default models, USD per 1k tokens. Local and mock calls are free. */
export const MODEL_PRICING: Record<string, ModelPricing> = {
  "gpt-5-mini": { input_cost_per_1k_tokens: 0.00025, output_cost_per_1k_tokens: 0.002 },
  "gpt-5-codex": { input_cost_per_1k_tokens: 0.00125, output_cost_per_1k_tokens: 0.01 },
  "claude-haiku-4-5": { input_cost_per_1k_tokens: 0.001, output_cost_per_1k_tokens: 0.005 },
  "claude-sonnet-4-5": { input_cost_per_1k_tokens: 0.003, output_cost_per_1k_tokens: 0.015 },
  "gpt-oss-20b": { input_cost_per_1k_tokens: 0, output_cost_per_1k_tokens: 0 },
  mock: { input_cost_per_1k_tokens: 0, output_cost_per_1k_tokens: 0 },
};

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  // Network errors
  if (msg.includes("econnreset") || msg.includes("econnrefused") || msg.includes("etimedout") || msg.includes("fetch failed") || msg.includes("socket hang up")) return true;
  // HTTP 5xx or 429 from SDK errors
  if ("status" in err && typeof err.status === "number") {
    if (err.status === 429 || err.status >= 500) return true;
  }
  return false;
}

export async function withRetry<T>(fn: () => Promise<T>, baseDelayMs = BASE_DELAY_MS): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < MAX_RETRIES && isTransientError(err)) {
        const delay = baseDelayMs * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);
        await new Promise((r) => setTimeout(r, delay));
        continue;
      }
      throw err;
    }
  }
  throw lastError;
}

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((p) => p === value);
}

/** Flag, then MUDPROBE_PROVIDER, then OpenAI when a key is around, else a local server. */
export function resolveProvider(explicit?: string, env: NodeJS.ProcessEnv = process.env): Provider {
  const value = explicit ?? env.MUDPROBE_PROVIDER ?? (env.OPENAI_API_KEY ? "openai" : "local");
  if (!isProvider(value)) {
    throw new ConfigError(`Unknown provider: "${value}". Valid options: ${PROVIDERS.join(", ")}`);
  }
  return value;
}

export interface ModelCallConfig {
  provider: Provider;
  model: string;
  baseURL?: string;
  retryDelayMs?: number;
}

function createClaudeCallFn(model: string, retryDelayMs?: number): ModelCallFn {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    throw new ConfigError(
      "ANTHROPIC_API_KEY environment variable is required for the claude provider.\n" +
      "Set it with: export ANTHROPIC_API_KEY=..."
    );
  }

  // Cache client across calls for HTTP connection pooling; clear on failure so next call retries
  let clientPromise: Promise<InstanceType<typeof import("@anthropic-ai/sdk").default>> | null = null;

  return async (systemPrompt: string, userPrompt: string, _options: ModelCallOptions): Promise<ModelCallResult> => {
    if (!clientPromise) {
      clientPromise = import("@anthropic-ai/sdk").then(
        ({ default: Anthropic }) => new Anthropic({ apiKey })
      ).catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    return withRetry(async () => {
      const response = await client.messages.create({
        model,
        max_tokens: 4096,
        system: systemPrompt,
        messages: [{ role: "user", content: userPrompt }],
      });
      const text = response.content.map((b) => (b.type === "text" ? b.text : "")).join("");
      if (!text) {
        throw new Error("Claude returned no text content");
      }
      return {
        text,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
          total_tokens: response.usage.input_tokens + response.usage.output_tokens,
          model,
        },
      };
    }, retryDelayMs);
  };
}

function createOpenAICallFn(model: string, baseURL: string | undefined, local: boolean, retryDelayMs?: number): ModelCallFn {
  const apiKey = process.env.OPENAI_API_KEY;

  if (!apiKey && !baseURL) {
    throw new ConfigError(
      "OPENAI_API_KEY or OPENAI_BASE_URL environment variable is required for the openai provider.\n" +
      "Set it with: export OPENAI_API_KEY=...\n" +
      `For a local server: --provider local (default ${LOCAL_BASE_URL})`
    );
  }

  // Cache client across calls for HTTP connection pooling; clear on failure so next call retries
  let clientPromise: Promise<InstanceType<typeof import("openai").default>> | null = null;

  return async (systemPrompt: string, userPrompt: string, options: ModelCallOptions): Promise<ModelCallResult> => {
    if (!clientPromise) {
      clientPromise = import("openai").then(
        ({ default: OpenAI }) => new OpenAI({
          apiKey: apiKey ?? "not-needed",
          ...(baseURL ? { baseURL } : {}),
        })
      ).catch((err: unknown) => { clientPromise = null; throw err; });
    }
    const client = await clientPromise;
    // Local servers tend to reject json_object; the prompts already ask for JSON
    const jsonMode = options.format === "json" && !local;
    return withRetry(async () => {
      const response = await client.chat.completions.create({
        model,
        response_format: jsonMode ? { type: "json_object" } : { type: "text" },
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
      });
      let content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("OpenAI returned no content");
      }
      // Strip <think>...</think> reasoning emitted by some local models
      content = content.replace(/<think>[\s\S]*?<\/think>\s*/g, "");
      const promptTokens = response.usage?.prompt_tokens ?? 0;
      const completionTokens = response.usage?.completion_tokens ?? 0;
      return {
        text: content,
        usage: {
          input_tokens: promptTokens,
          output_tokens: completionTokens,
          total_tokens: promptTokens + completionTokens,
          model,
        },
      };
    }, retryDelayMs);
  };
}

const MOCK_JSON_REPLY = JSON.stringify({
  action: "continue",
  reasoning: "Mock oracle: no model configured",
  assessment: "Not assessed",
  passed: true,
  analysis: "Mock oracle accepts every step",
  game_evidence: "N/A",
  test_name: "Mock plan",
  steps: [{ action: "observe_game_state", params: {}, expected: "game state" }],
});

/** Offline stand-in: one reply that satisfies every structured request. */
export function createMockCallFn(): ModelCallFn {
  return async (_systemPrompt, _userPrompt, options) => ({
    text: options.format === "json" ? MOCK_JSON_REPLY : "Mock analysis: no model configured.",
    usage: { input_tokens: 0, output_tokens: 0, total_tokens: 0, model: "mock" },
  });
}

export function createModelCall(config: ModelCallConfig): ModelCallFn {
  switch (config.provider) {
    case "mock":
      return createMockCallFn();
    case "claude":
      return createClaudeCallFn(config.model, config.retryDelayMs);
    case "openai":
      return createOpenAICallFn(config.model, config.baseURL ?? process.env.OPENAI_BASE_URL, false, config.retryDelayMs);
    case "local":
      return createOpenAICallFn(config.model, config.baseURL ?? LOCAL_BASE_URL, true, config.retryDelayMs);
  }
}
