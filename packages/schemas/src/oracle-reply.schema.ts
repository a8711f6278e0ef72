// Replies are validated loosely: unknown extra keys are tolerated because models
// routinely add commentary fields. `action` is checked by the oracle itself so an
// unexpected value surfaces as an unrecognized decision, not a malformed reply.

export const DecisionReplySchema = {
  type: "object",
  properties: {
    reasoning: { type: "string" },
    assessment: { type: "string" },
    // Item types and the wait's range are normalised by the oracle, so one
    // stray entry does not throw away the whole intervention.
    commands: { type: "array" },
    wait_for_result: { type: "number" },
  },
} as const;

export const FollowUpReplySchema = {
  type: "object",
  properties: {
    reasoning: { type: "string" },
    assessment: { type: "string" },
    next_concern: { type: ["string", "null"] },
  },
} as const;

export const VerificationReplySchema = {
  type: "object",
  required: ["passed"],
  properties: {
    passed: { type: "boolean" },
    analysis: { type: "string" },
    game_evidence: { type: "string" },
  },
} as const;

export const TestStepSchema = {
  type: "object",
  required: ["action"],
  properties: {
    action: { type: "string", minLength: 1 },
    params: { type: "object" },
    expected: { type: "string" },
    wait_for: { type: "string" },
    verify_output: { type: "boolean" },
  },
} as const;

export const TestPlanReplySchema = {
  type: "object",
  required: ["steps"],
  properties: {
    test_name: { type: "string" },
    description: { type: "string" },
    steps: { type: "array", items: TestStepSchema },
  },
} as const;
