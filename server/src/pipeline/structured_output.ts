import { MalformedOutputError, fail, ok, type StepResult } from "./errors.js";
import { excerpt } from "./utils.js";

const FENCE = "```";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Removes a Markdown code fence wrapped around model output.
 * Only the content between the first and second fence markers is kept, and a
 * leading `json` language tag is dropped.
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith(FENCE)) return text;

  const inner = text.slice(FENCE.length);
  const close = inner.indexOf(FENCE);
  let body = close === -1 ? inner : inner.slice(0, close);
  if (body.startsWith("json")) body = body.slice("json".length);
  return body.trim();
}

export function parseStructuredOutput(raw: string): StepResult<Record<string, unknown>> {
  const cleaned = stripCodeFence(raw);
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail(new MalformedOutputError(`Model output is not valid JSON (${reason})`, excerpt(raw)));
  }

  if (!isRecord(parsed)) {
    return fail(new MalformedOutputError("Model output must be a JSON object", excerpt(raw)));
  }
  return ok(parsed);
}
