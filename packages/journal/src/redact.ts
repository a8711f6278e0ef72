const SENSITIVE_KEYS = /^(authorization|password|passwd|secret|token|api[_-]?key|credential|private[_-]?key|access[_-]?token|refresh[_-]?token|client[_-]?secret)$/i;
const SENSITIVE_VALUES = /Bearer\s|sk-ant-|sk-proj-|sk-[A-Za-z0-9]{16,}|AKIA[A-Z0-9]{16}|eyJ[A-Za-z0-9_-]{10,}\.|-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY/;

/**
 * Replace secret-looking values before they reach the journal. Game output is
 * journaled verbatim otherwise, and players do type passwords into MUDs.
 */
export function redactPayload(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") {
    return SENSITIVE_VALUES.test(value) ? "[REDACTED]" : value;
  }
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(redactPayload);
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (SENSITIVE_KEYS.test(k) && (typeof v === "string" || typeof v === "number")) {
      result[k] = "[REDACTED]";
    } else {
      result[k] = redactPayload(v);
    }
  }
  return result;
}
