export type JsonObject = Record<string, unknown>;

const FENCED_BLOCK = /```[a-zA-Z]*[ \t]*\r?\n?([\s\S]*?)```/g;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | undefined {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/** Index just past the `}` closing the object that opens at `start`. */
function objectEnd(text: string, start: number): number | undefined {
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }

  return undefined;
}

/**
 * Finds the JSON object in a model response. Tried in order: the whole text,
 * each fenced code block, then each top-level `{...}` run in the prose. The
 * first candidate that parses to an object wins; otherwise the result is `{}`.
 */
export function parseJsonObject(content: string): JsonObject {
  const trimmed = content.trim();

  const direct = tryParseObject(trimmed);
  if (direct) {
    return direct;
  }

  for (const match of trimmed.matchAll(FENCED_BLOCK)) {
    const fenced = tryParseObject(match[1].trim());
    if (fenced) {
      return fenced;
    }
  }

  let start = trimmed.indexOf('{');
  while (start !== -1) {
    const end = objectEnd(trimmed, start);
    if (end === undefined) {
      break;
    }
    const embedded = tryParseObject(trimmed.slice(start, end));
    if (embedded) {
      return embedded;
    }
    start = trimmed.indexOf('{', end);
  }

  return {};
}
