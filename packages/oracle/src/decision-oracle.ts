import type {
  BridgeResult,
  Decision,
  FollowUpDecision,
  InterveneDecision,
  Snapshot,
  TestPlan,
  TestStep,
  ValidationResult,
  Verification,
} from "@mudprobe/schemas";
import {
  validateDecisionReply,
  validateFollowUpReply,
  validateTestPlanReply,
  validateVerificationReply,
} from "@mudprobe/schemas";
import type { ModelCallFn, ResponseFormat } from "./model.js";
import { MalformedResponseError } from "./errors.js";
import { extractJson } from "./extract-json.js";
import type { PromptArchive } from "./prompt-archive.js";
import type { UsageAccumulator } from "./usage-accumulator.js";
import {
  ANALYSIS_SYSTEM_PROMPT,
  FOLLOW_UP_SYSTEM_PROMPT,
  MONITOR_SYSTEM_PROMPT,
  TEST_PLAN_SYSTEM_PROMPT,
  VERIFY_SYSTEM_PROMPT,
  buildAnalysisPrompt,
  buildConsultPrompt,
  buildFollowUpPrompt,
  buildTestPlanPrompt,
  buildVerifyPrompt,
} from "./prompts.js";
import type { ConsultSituation, TestPlanRequest } from "./prompts.js";

/** Seconds to wait after an intervention when the oracle names no wait. */
export const DEFAULT_WAIT_SECONDS = 3;
/** Upper bound on an intervention's wait. */
export const MAX_WAIT_SECONDS = 300;

export interface DecisionOracleOptions {
  call: ModelCallFn;
  usage?: UsageAccumulator;
  archive?: PromptArchive;
  /** Game mechanics notes (markdown) shown when planning tests. */
  gameContext?: string;
  log?: (line: string) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Structured access to the language model. Supervision calls (consult,
 * followUp, verifyOutput) never throw: a failed call turns into the safe
 * default for that call. Planning and analysis let the caller decide.
 */
export class DecisionOracle {
  private call: ModelCallFn;
  private usage?: UsageAccumulator;
  private archive?: PromptArchive;
  private gameContext?: string;
  private log: (line: string) => void;

  constructor(options: DecisionOracleOptions) {
    this.call = options.call;
    this.usage = options.usage;
    this.archive = options.archive;
    this.gameContext = options.gameContext;
    this.log = options.log ?? ((line) => console.log(line));
  }

  async consult(situation: ConsultSituation): Promise<Decision> {
    try {
      const prompt = buildConsultPrompt(situation);
      const reply = await this.ask(MONITOR_SYSTEM_PROMPT, prompt, "json", "decision", `elapsed_${situation.elapsedSeconds}s`);
      return parseDecision(reply);
    } catch (err) {
      this.log(`[oracle] consultation failed: ${errorText(err)}`);
      return {
        action: "continue",
        reasoning: `Oracle error: ${errorText(err)}, continuing cautiously`,
        assessment: "Oracle consultation failed",
      };
    }
  }

  async followUp(
    intervention: InterveneDecision,
    postState: Snapshot,
    postOutput: string[],
    elapsedSeconds: number
  ): Promise<FollowUpDecision> {
    try {
      const prompt = buildFollowUpPrompt(intervention, postState, postOutput, elapsedSeconds);
      const reply = await this.ask(FOLLOW_UP_SYSTEM_PROMPT, prompt, "json", "followup", `elapsed_${elapsedSeconds}s`);
      return parseFollowUp(reply);
    } catch (err) {
      this.log(`[oracle] follow-up failed: ${errorText(err)}`);
      return {
        action: "continue",
        reasoning: `Oracle error: ${errorText(err)}, continuing`,
        assessment: "Unable to assess intervention results",
        nextConcern: null,
      };
    }
  }

  async verifyOutput(
    action: string,
    params: Record<string, unknown>,
    result: BridgeResult,
    expected: string,
    recentOutput: string[]
  ): Promise<Verification> {
    try {
      const prompt = buildVerifyPrompt({
        action,
        params,
        result,
        expected,
        recentOutput,
        hasGameContext: Boolean(this.gameContext),
      });
      const reply = await this.ask(VERIFY_SYSTEM_PROMPT, prompt, "json", "verification", action);
      return parseVerification(reply);
    } catch (err) {
      this.log(`[oracle] verification failed: ${errorText(err)}`);
      return {
        passed: false,
        analysis: `Oracle verification failed: ${errorText(err)}`,
        game_evidence: "N/A",
      };
    }
  }

  /** @throws MalformedResponseError when the reply is not a usable plan */
  async requestTestPlan(request: TestPlanRequest): Promise<TestPlan> {
    const prompt = buildTestPlanPrompt(request, this.gameContext);
    const reply = await this.ask(TEST_PLAN_SYSTEM_PROMPT, prompt, "json", "test_plan", request.feature);
    return parseTestPlan(reply);
  }

  async analyzeFailure(description: string, context: Record<string, unknown>): Promise<string> {
    const prompt = buildAnalysisPrompt(description, context);
    return this.ask(ANALYSIS_SYSTEM_PROMPT, prompt, "text", "failure_analysis", description.slice(0, 30));
  }

  private async ask(
    systemPrompt: string,
    userPrompt: string,
    format: ResponseFormat,
    kind: string,
    context: string
  ): Promise<string> {
    if (this.archive) {
      try {
        await this.archive.save(kind, context, `${systemPrompt}\n\n${userPrompt}`);
      } catch (err) {
        this.log(`[oracle] could not archive ${kind} prompt: ${errorText(err)}`);
      }
    }
    const result = await this.call(systemPrompt, userPrompt, { format });
    if (result.usage) this.usage?.record(result.usage);
    return result.text;
  }
}

function decode(reply: string, validate: (data: unknown) => ValidationResult): Record<string, unknown> {
  const data = extractJson(reply);
  if (!isRecord(data)) {
    throw new MalformedResponseError("Response is not a JSON object", reply);
  }
  const validation = validate(data);
  if (!validation.valid) {
    throw new MalformedResponseError(`Response failed validation: ${validation.errors.join(", ")}`, reply);
  }
  return data;
}

export function parseDecision(reply: string): Decision {
  const data = decode(reply, validateDecisionReply);
  const reasoning = text(data.reasoning);
  const assessment = text(data.assessment);
  switch (data.action) {
    case "continue":
      return { action: "continue", reasoning, assessment };
    case "abort":
      return { action: "abort", reasoning, assessment };
    case "intervene": {
      const commands = Array.isArray(data.commands)
        ? data.commands.filter((c): c is string => typeof c === "string")
        : [];
      const waitSeconds = typeof data.wait_for_result === "number"
        ? Math.min(MAX_WAIT_SECONDS, Math.max(0, Math.floor(data.wait_for_result)))
        : DEFAULT_WAIT_SECONDS;
      return { action: "intervene", reasoning, assessment, commands, waitSeconds };
    }
    default:
      return { action: "unrecognized", reasoning, assessment, rawAction: data.action };
  }
}

export function parseFollowUp(reply: string): FollowUpDecision {
  const data = decode(reply, validateFollowUpReply);
  return {
    // Anything but an explicit abort keeps the run going
    action: data.action === "abort" ? "abort" : "continue",
    reasoning: text(data.reasoning),
    assessment: text(data.assessment),
    nextConcern: typeof data.next_concern === "string" ? data.next_concern : null,
  };
}

export function parseVerification(reply: string): Verification {
  const data = decode(reply, validateVerificationReply);
  return {
    passed: data.passed === true,
    analysis: text(data.analysis),
    game_evidence: text(data.game_evidence),
  };
}

export function parseTestPlan(reply: string): TestPlan {
  const data = decode(reply, validateTestPlanReply);
  const steps: TestStep[] = [];
  const rawSteps = Array.isArray(data.steps) ? data.steps : [];
  for (const raw of rawSteps) {
    if (!isRecord(raw) || typeof raw.action !== "string") continue;
    const step: TestStep = { action: raw.action };
    if (isRecord(raw.params)) step.params = raw.params;
    if (typeof raw.expected === "string") step.expected = raw.expected;
    if (typeof raw.wait_for === "string" && raw.wait_for) step.wait_for = raw.wait_for;
    if (typeof raw.verify_output === "boolean") step.verify_output = raw.verify_output;
    steps.push(step);
  }
  const plan: TestPlan = { steps };
  if (typeof data.test_name === "string") plan.test_name = data.test_name;
  if (typeof data.description === "string") plan.description = data.description;
  return plan;
}
