export type JsonObject = Record<string, unknown>;

/**
 * Returns the first `{...}` span in `text` that is balanced and parses to a
 * plain object. Candidates are tried in order of their opening brace, so
 * prose or broken fragments before the real payload are skipped.
 */
export function extractFirstJsonObject(text: string): JsonObject | undefined {
  let from = text.indexOf("{");
  while (from !== -1) {
    const end = findBalancedEnd(text, from);
    if (end !== -1) {
      const parsed = safeJsonParse(text.slice(from, end + 1));
      if (isJsonObject(parsed)) {
        return parsed;
      }
    }
    from = text.indexOf("{", from + 1);
  }
  return undefined;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function safeJsonParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

function findBalancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    }
  }

  return -1;
}
