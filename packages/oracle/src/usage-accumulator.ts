import type { UsageMetrics, UsageSummary } from "@mudprobe/schemas";

export interface ModelPricing {
  input_cost_per_1k_tokens: number;
  output_cost_per_1k_tokens: number;
}

/**
 * Running token totals across oracle calls. A run talks to two models
 * (monitor and analysis), so pricing is looked up by the model each call
 * reports; calls that already carry `cost_usd` are taken as-is.
 */
export class UsageAccumulator {
  private inputTokens = 0;
  private outputTokens = 0;
  private tokens = 0;
  private costUsd = 0;
  private calls = 0;
  private pricing: Map<string, ModelPricing>;
  private perModel = new Map<string, number>();

  constructor(pricing: Record<string, ModelPricing> = {}) {
    this.pricing = new Map(Object.entries(pricing));
  }

  record(usage: UsageMetrics): void {
    this.inputTokens += usage.input_tokens;
    this.outputTokens += usage.output_tokens;
    this.tokens += usage.total_tokens;
    this.calls++;

    const model = usage.model ?? "unknown";
    this.perModel.set(model, (this.perModel.get(model) ?? 0) + usage.total_tokens);

    const price = usage.model !== undefined ? this.pricing.get(usage.model) : undefined;
    if (usage.cost_usd != null) {
      this.costUsd += usage.cost_usd;
    } else if (price) {
      this.costUsd +=
        (usage.input_tokens / 1000) * price.input_cost_per_1k_tokens +
        (usage.output_tokens / 1000) * price.output_cost_per_1k_tokens;
    }
  }

  getSummary(): UsageSummary {
    return {
      total_input_tokens: this.inputTokens,
      total_output_tokens: this.outputTokens,
      total_tokens: this.tokens,
      total_cost_usd: this.costUsd,
      call_count: this.calls,
    };
  }

  /** Total tokens per reported model name. */
  byModel(): Record<string, number> {
    return Object.fromEntries(this.perModel);
  }

  get totalTokens(): number {
    return this.tokens;
  }
}
