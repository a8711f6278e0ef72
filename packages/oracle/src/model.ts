import type { UsageMetrics } from "@mudprobe/schemas";

export type ResponseFormat = "json" | "text";

export interface ModelCallOptions {
  format: ResponseFormat;
}

export interface ModelCallResult {
  text: string;
  usage?: UsageMetrics;
}

/** One round-trip to a language model. Provider adapters implement this. */
export type ModelCallFn = (
  systemPrompt: string,
  userPrompt: string,
  options: ModelCallOptions
) => Promise<ModelCallResult>;
