import { MalformedResponseError } from "./errors.js";

/**
 * Decode a JSON reply that may be wrapped in one markdown code fence, with or
 * without a language tag.
 */
export function extractJson(text: string): unknown {
  let jsonStr = text.trim();
  if (jsonStr.startsWith("```")) {
    jsonStr = jsonStr.replace(/^```[A-Za-z]*[ \t]*\n?/, "").replace(/\n?```$/, "").trim();
  } else {
    // Prose before a fenced block: take the fenced part
    const fenced = /```[A-Za-z]*[ \t]*\n([\s\S]*?)\n?```/.exec(jsonStr);
    if (fenced?.[1] !== undefined) jsonStr = fenced[1].trim();
  }
  try {
    return JSON.parse(jsonStr);
  } catch (err) {
    throw new MalformedResponseError(
      `Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      text
    );
  }
}
