import { describe, it, expect } from "vitest";
import { UsageAccumulator } from "./usage-accumulator.js";

describe("UsageAccumulator", () => {
  it("sums tokens and prices by model", () => {
    const acc = new UsageAccumulator({
      "monitor-model": { input_cost_per_1k_tokens: 1, output_cost_per_1k_tokens: 2 },
    });
    acc.record({ input_tokens: 1000, output_tokens: 500, total_tokens: 1500, model: "monitor-model" });
    acc.record({ input_tokens: 200, output_tokens: 100, total_tokens: 300, model: "analysis-model", cost_usd: 0.5 });
    acc.record({ input_tokens: 10, output_tokens: 10, total_tokens: 20 });

    expect(acc.getSummary()).toEqual({
      total_input_tokens: 1210,
      total_output_tokens: 610,
      total_tokens: 1820,
      total_cost_usd: 2.5,
      call_count: 3,
    });
    expect(acc.byModel()).toEqual({ "monitor-model": 1500, "analysis-model": 300, unknown: 20 });
    expect(acc.totalTokens).toBe(1820);
  });
});
