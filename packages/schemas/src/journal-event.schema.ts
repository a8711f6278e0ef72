export const JOURNAL_EVENT_TYPES = [
  "run.started", "run.setup_failed", "run.tick", "run.hp_changed", "run.monsters_changed",
  "run.game_error", "oracle.consulted", "oracle.followup", "intervention.executed",
  "run.aborted", "run.interrupted", "run.faulted", "run.completed", "run.teardown", "run.analysis",
  "executor.plan_received", "executor.plan_rejected", "executor.step_completed", "executor.completed",
] as const;

export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "session_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    session_id: { type: "string", minLength: 1 },
    type: { type: "string", enum: JOURNAL_EVENT_TYPES },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
