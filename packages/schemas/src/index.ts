export * from "./types.js";
export { JournalEventSchema, JOURNAL_EVENT_TYPES } from "./journal-event.schema.js";
export {
  DecisionReplySchema,
  FollowUpReplySchema,
  VerificationReplySchema,
  TestPlanReplySchema,
  TestStepSchema,
} from "./oracle-reply.schema.js";
export {
  validateJournalEventData,
  validateDecisionReply,
  validateFollowUpReply,
  validateVerificationReply,
  validateTestPlanReply,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
