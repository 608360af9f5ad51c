import { ExtractionError } from "./errors";
import { validateRating, type RatingCandidate } from "./schema";
import type { AdapterKind, RawReply } from "./types";

const FENCED_JSON = /```json\s*(\{[\s\S]*?\})\s*```/;
const REASONING_BLOCK = /<think>[\s\S]*?<\/think>/gi;
const REASONING_CLOSE = /<\/think>/gi;
const REASONING_MARKER = /<\/?think>/gi;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Returns the end index (inclusive) of the balanced object opening at
 * `start`, or -1 when the text ends first. Braces inside string literals do
 * not count.
 */
function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function scanBalancedObject(text: string): JsonObject | undefined {
  let start = text.indexOf("{");
  while (start !== -1) {
    const end = findObjectEnd(text, start);
    if (end === -1) {
      return undefined;
    }
    const parsed = tryParseObject(text.slice(start, end + 1));
    if (parsed) {
      return parsed;
    }
    start = text.indexOf("{", start + 1);
  }
  return undefined;
}

/**
 * Pulls one JSON object out of a free-text reply. Tried in order: the whole
 * reply, a ```json fenced block, then the first balanced `{...}` span.
 */
export function extractJsonObject(text: string): JsonObject {
  const trimmed = text.trim();
  const direct = tryParseObject(trimmed);
  if (direct) {
    return direct;
  }

  const fenced = FENCED_JSON.exec(trimmed)?.[1];
  if (fenced) {
    const parsed = tryParseObject(fenced);
    if (parsed) {
      return parsed;
    }
  }

  const scanned = scanBalancedObject(trimmed);
  if (scanned) {
    return scanned;
  }

  throw new ExtractionError();
}

/**
 * Drops `<think>...</think>` regions. A closing marker without an opener
 * ends a preamble when it comes before the first `{`, so everything before
 * it goes too; any other stray marker is removed on its own.
 */
export function stripReasoningBlocks(text: string): string {
  let cleaned = text.replace(REASONING_BLOCK, "");
  const closings = [...cleaned.matchAll(REASONING_CLOSE)];
  const lastClosing = closings[closings.length - 1];
  const firstBrace = cleaned.indexOf("{");
  if (
    lastClosing?.index !== undefined &&
    (firstBrace === -1 || lastClosing.index < firstBrace)
  ) {
    cleaned = cleaned.slice(lastClosing.index + lastClosing[0].length);
  }
  return cleaned.replace(REASONING_MARKER, "");
}

export function normalizeReply(
  reply: RawReply,
  kind: AdapterKind
): RatingCandidate {
  if (reply.type === "object") {
    return validateRating(reply.object);
  }

  const text = kind === "reasoning-json" ? stripReasoningBlocks(reply.text) : reply.text;
  return validateRating(extractJsonObject(text));
}
