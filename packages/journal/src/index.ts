export { Journal } from "./journal.js";
export type { JournalOptions, JournalListener } from "./journal.js";
export { redactPayload } from "./redact.js";
