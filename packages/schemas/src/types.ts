/**
 * mudprobe core types
 *
 * Canonical data models shared by the bridge, oracle, runner and CLI.
 * Wire-level names (snake_case) are kept where they mirror oracle replies.
 */

// ─── Snapshot ───────────────────────────────────────────────────────

export interface CharacterState {
  name?: string;
  level?: number;
  hp: number;
  maxHp?: number;
  hpPercent: number;
}

export interface LocationState {
  name: string;
  roomId?: string;
  exits: string[];
  monsters: string[];
  items: string[];
}

export interface CombatState {
  inCombat: boolean;
  targetedMonster: string | null;
}

export interface AutomationState {
  autoGong: boolean;
  autoAttack: boolean;
  autoShield: boolean;
}

/** Point-in-time capture of the game session. Never mutated after capture. */
export interface Snapshot {
  readonly character: Readonly<CharacterState>;
  readonly location: Readonly<LocationState>;
  readonly combat: Readonly<CombatState>;
  readonly automation: Readonly<AutomationState>;
  /** Set when the bridge could not produce a state. */
  readonly error?: string;
  /** Bridge payload as received; this is what the oracle sees. */
  readonly raw: Record<string, unknown>;
}

// ─── Bridge results ─────────────────────────────────────────────────

/** Loose result of a bridge tool call. Transport failures arrive as `{ error }`. */
export type BridgeResult = Record<string, unknown> & {
  success?: boolean;
  error?: string;
};

// ─── Decisions ──────────────────────────────────────────────────────

interface DecisionBase {
  reasoning: string;
  assessment: string;
}

export interface ContinueDecision extends DecisionBase {
  action: "continue";
}

export interface InterveneDecision extends DecisionBase {
  action: "intervene";
  commands: string[];
  waitSeconds: number;
}

export interface AbortDecision extends DecisionBase {
  action: "abort";
}

/** The oracle answered with an action outside the known set. */
export interface UnrecognizedDecision extends DecisionBase {
  action: "unrecognized";
  rawAction: unknown;
}

export type Decision = ContinueDecision | InterveneDecision | AbortDecision | UnrecognizedDecision;

export interface FollowUpDecision extends DecisionBase {
  action: "continue" | "abort";
  nextConcern: string | null;
}

export interface Verification {
  passed: boolean;
  analysis: string;
  game_evidence: string;
}

// ─── Monitoring accumulator ─────────────────────────────────────────

export interface CombatEvent {
  time: number;
  target: string | null;
  hp: number;
  hpPercent: number;
}

export interface HpChange {
  time: number;
  from: number;
  to: number;
  percent: number;
}

export interface ErrorRecord {
  time: number;
  message: string;
}

export type InterventionReason = "ORACLE_ABORT" | "ORACLE_INTERVENTION";

export interface Intervention {
  time: number;
  reason: InterventionReason;
  /** The oracle's reasoning for the intervention. */
  action: string;
  commands?: string[];
  details: Decision;
}

export type DecisionRecord =
  | { time: number; type: "periodic"; decision: Decision }
  | { time: number; type: "followup"; decision: FollowUpDecision };

/** Append-only accumulator owned by a single supervision run. */
export interface MonitoringData {
  cycles: number;
  monstersKilled: number;
  combatEvents: CombatEvent[];
  hpChanges: HpChange[];
  errors: ErrorRecord[];
  interventions: Intervention[];
  decisions: DecisionRecord[];
  issues: string[];
}

// ─── Reports ────────────────────────────────────────────────────────

export type RunState = "running" | "completed" | "aborted" | "interrupted" | "faulted";

export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
  total_tokens: number;
  model?: string;
  cost_usd?: number;
}

export interface UsageSummary {
  total_input_tokens: number;
  total_output_tokens: number;
  total_tokens: number;
  total_cost_usd: number;
  call_count: number;
}

export interface RunStats {
  cycles: number;
  kills: number;
  combatEvents: number;
  hpChanges: number;
  errors: number;
  decisions: number;
  interventions: number;
}

export interface SupervisionReport {
  kind: "supervision";
  test: string;
  feature: string;
  durationSeconds: number;
  state: Exclude<RunState, "running">;
  passed: boolean;
  failureReason: string | null;
  issues: string[];
  monitoring: MonitoringData;
  stats: RunStats;
  analysis?: string;
  usage?: UsageSummary;
}

export interface SetupFailureReport {
  kind: "setup_failed";
  test: string;
  feature: string;
  passed: false;
  error: string;
  result: BridgeResult;
}

export type SupervisionResult = SupervisionReport | SetupFailureReport;

// ─── Test plans (single-shot executor) ──────────────────────────────

export interface TestStep {
  action: string;
  params?: Record<string, unknown>;
  expected?: string;
  wait_for?: string;
  verify_output?: boolean;
}

export interface TestPlan {
  test_name?: string;
  description?: string;
  steps: TestStep[];
}

export interface StepOutcome {
  step: TestStep;
  result: BridgeResult;
  verification?: Verification;
  passed: boolean;
}

export interface FeatureTestReport {
  kind: "feature";
  feature: string;
  testPlan?: TestPlan;
  results: StepOutcome[];
  overallPass: boolean;
  customPrompt?: string;
  error?: string;
  llmResponse?: string;
  usage?: UsageSummary;
}

// ─── Journal ────────────────────────────────────────────────────────

export type JournalEventType =
  | "run.started"
  | "run.setup_failed"
  | "run.tick"
  | "run.hp_changed"
  | "run.monsters_changed"
  | "run.game_error"
  | "oracle.consulted"
  | "oracle.followup"
  | "intervention.executed"
  | "run.aborted"
  | "run.interrupted"
  | "run.faulted"
  | "run.completed"
  | "run.teardown"
  | "run.analysis"
  | "executor.plan_received"
  | "executor.plan_rejected"
  | "executor.step_completed"
  | "executor.completed";

export interface JournalEvent {
  event_id: string;
  timestamp: string;
  session_id: string;
  type: JournalEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}
