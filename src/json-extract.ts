/**
 * Tolerant JSON extraction for oracle replies, which may wrap the object in
 * prose, markdown fences or tool-call tags.
 */

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}

/** End index (inclusive) of the balanced object starting at `start`, or -1. */
function balancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * First JSON object found in `raw`: the whole text, then a fenced code block,
 * then the first balanced `{...}` that parses. Null when there is none.
 */
export function extractJsonObject(raw: string): JsonObject | null {
  const text = raw.trim();
  if (!text) return null;

  const direct = tryParseObject(text);
  if (direct) return direct;

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) {
    const inner = tryParseObject(fenced[1].trim());
    if (inner) return inner;
  }

  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    const end = balancedEnd(text, start);
    if (end === -1) break;
    const candidate = tryParseObject(text.slice(start, end + 1));
    if (candidate) return candidate;
  }
  return null;
}
