import { describe, it, expect } from "vitest";
import type { Snapshot } from "@mudprobe/schemas";
import { buildTestPlanPrompt } from "./prompts.js";

const snapshot: Snapshot = {
  character: { hp: 50, hpPercent: 50 },
  location: { name: "Arena", exits: [], monsters: [], items: [] },
  combat: { inCombat: false, targetedMonster: null },
  automation: { autoGong: false, autoAttack: false, autoShield: true },
  raw: { character: { hp: 50 } },
};

describe("buildTestPlanPrompt", () => {
  it("passes the operator request as plain instructions", () => {
    const prompt = buildTestPlanPrompt({
      feature: "custom",
      snapshot,
      recentOutput: [],
      customPrompt: "Test that autoshield casts",
    });
    expect(prompt).toContain("\n## Operator request\nTest that autoshield casts\n");
    expect(prompt).not.toContain("<<<UNTRUSTED_INPUT>>>\nTest that autoshield casts");
  });

  it("still fences game output", () => {
    const prompt = buildTestPlanPrompt({
      feature: "custom",
      snapshot,
      recentOutput: ["A goblin arrives."],
      customPrompt: "Kill the goblin",
    });
    expect(prompt).toContain("<<<UNTRUSTED_INPUT>>>\nA goblin arrives.\n<<<END_UNTRUSTED_INPUT>>>");
    expect(prompt).toContain("## Operator request\nKill the goblin\n");
  });
});
