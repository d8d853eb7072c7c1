/**
 * Pull a JSON payload out of model output.
 *
 * Models wrap JSON in ```json fences, lead with prose ("Here is the result:"), or trail
 * commentary. We scan for balanced `{…}` / `[…]` blocks (string- and escape-aware),
 * starting inside the first code fence when there is one, and return the first block
 * that parses. Callers validate the shape; this only answers "is there JSON here".
 */

export type JsonExtraction =
  | { ok: true; value: unknown; raw: string }
  | { ok: false; reason: string };

const FENCE_PATTERN = /```(?:json)?/i;

/** Balanced block starting at `start` (which must be `{` or `[`), or null if it never closes. */
export function scanBalanced(text: string, start: number): string | null {
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escape) escape = false;
      else if (ch === "\\") escape = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{" || ch === "[") {
      depth++;
    } else if (ch === "}" || ch === "]") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
      if (depth < 0) return null;
    }
  }
  return null;
}

function tryParse(candidate: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(candidate);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function firstParsableBlock(text: string, from: number): JsonExtraction | null {
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch !== "{" && ch !== "[") continue;
    const block = scanBalanced(text, i);
    if (!block) continue;
    const parsed = tryParse(block);
    if (parsed.ok) return { ok: true, value: parsed.value, raw: block };
  }
  return null;
}

export function extractJson(content: string): JsonExtraction {
  const text = content.trim();
  if (!text) return { ok: false, reason: "empty response" };

  const fence = FENCE_PATTERN.exec(text);
  if (fence) {
    const fenced = firstParsableBlock(text, fence.index + fence[0].length);
    if (fenced) return fenced;
  }

  const anywhere = firstParsableBlock(text, 0);
  if (anywhere) return anywhere;

  const whole = tryParse(text);
  if (whole.ok) return { ok: true, value: whole.value, raw: text };

  return { ok: false, reason: "no parsable JSON object or array found" };
}
