import Ajv, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import { JournalEventSchema } from "./journal-event.schema.js";
import {
  DecisionReplySchema,
  FollowUpReplySchema,
  VerificationReplySchema,
  TestPlanReplySchema,
} from "./oracle-reply.schema.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop — resolve it safely.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const journalEventValidator = ajv.compile(JournalEventSchema);
const decisionReplyValidator = ajv.compile(DecisionReplySchema);
const followUpReplyValidator = ajv.compile(FollowUpReplySchema);
const verificationReplyValidator = ajv.compile(VerificationReplySchema);
const testPlanReplyValidator = ajv.compile(TestPlanReplySchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

function run(validate: ValidateFunction, data: unknown): ValidationResult {
  const valid = validate(data);
  return toResult(valid, validate.errors);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  return run(journalEventValidator, data);
}

export function validateDecisionReply(data: unknown): ValidationResult {
  return run(decisionReplyValidator, data);
}

export function validateFollowUpReply(data: unknown): ValidationResult {
  return run(followUpReplyValidator, data);
}

export function validateVerificationReply(data: unknown): ValidationResult {
  return run(verificationReplyValidator, data);
}

export function validateTestPlanReply(data: unknown): ValidationResult {
  return run(testPlanReplyValidator, data);
}
