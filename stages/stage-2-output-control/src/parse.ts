/**
 * Extract a JSON payload from raw LLM content.
 * Handles markdown code blocks, prose before/after the payload, payloads that were
 * themselves JSON-encoded as a string, escaped quotes and trailing commas.
 */

export type ExtractResult =
  | { found: true; json: string; value: unknown }
  | { found: false; reason: string };

export interface ExtractOptions {
  /** Strip ```json ... ``` wrappers before searching (default true). */
  stripMarkdownCodeBlock?: boolean;
  /** Which container to look for (default "any"). */
  expect?: "object" | "array" | "any";
}

const CODE_BLOCK_REGEX = /```(?:json|JSON)?[ \t]*\n?([\s\S]*?)\n?```/;
const MAX_UNWRAP_DEPTH = 2;

/**
 * End index of the balanced `{...}` or `[...]` starting at startIndex, ignoring
 * brackets inside strings. -1 when unclosed or mismatched.
 */
function findMatchingBracketEnd(text: string, startIndex: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = startIndex; i < text.length; i++) {
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
    } else if (ch === "{" || ch === "[") {
      stack.push(ch);
    } else if (ch === "}" || ch === "]") {
      const open = stack.pop();
      if ((open === "{" && ch !== "}") || (open === "[" && ch !== "]")) {
        return -1;
      }
      if (stack.length === 0) {
        return i;
      }
    }
  }
  return -1;
}

/**
 * Strip a markdown code block (```json ... ``` or ``` ... ```) anywhere in the
 * content and return its inner text; otherwise the trimmed content.
 */
export function stripMarkdownCodeBlock(content: string): string {
  const match = content.match(CODE_BLOCK_REGEX);
  if (match) {
    return match[1].trim();
  }
  return content.trim();
}

/** Drop commas that directly precede `}` or `]`, outside strings. */
export function removeTrailingCommas(json: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (inString) {
      out += ch;
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
      out += ch;
      continue;
    }
    if (ch === ",") {
      let j = i + 1;
      while (j < json.length && /\s/.test(json[j])) j++;
      if (json[j] === "}" || json[j] === "]") {
        continue;
      }
    }
    out += ch;
  }
  return out;
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: string };

function tryParse(json: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(json) as unknown };
  } catch (err) {
    return {
      ok: false,
      error: err instanceof Error ? err.message : "JSON parse failed",
    };
  }
}

/** Strict parse first, then progressively looser repairs. */
function parseWithRepairs(candidate: string): ParseAttempt & { json?: string } {
  const strict = tryParse(candidate);
  if (strict.ok) {
    return { ...strict, json: candidate };
  }

  const repairs: Array<(s: string) => string> = [
    removeTrailingCommas,
    (s) => removeTrailingCommas(s.replace(/\\"/g, '"')),
    (s) => removeTrailingCommas(s.replace(/[“”]/g, '"')),
  ];
  for (const repair of repairs) {
    const repaired = repair(candidate);
    if (repaired === candidate) {
      continue;
    }
    const attempt = tryParse(repaired);
    if (attempt.ok) {
      return { ...attempt, json: repaired };
    }
  }
  return strict;
}

function isWanted(
  ch: string,
  expect: NonNullable<ExtractOptions["expect"]>
): boolean {
  if (expect === "object") return ch === "{";
  if (expect === "array") return ch === "[";
  return ch === "{" || ch === "[";
}

/**
 * A payload that is one JSON string whose content is JSON
 * (`"{\"total\": 1}"`) gets unwrapped.
 */
function unwrapEncodedString(text: string): string | undefined {
  if (!text.startsWith('"')) {
    return undefined;
  }
  const attempt = tryParse(text);
  if (attempt.ok && typeof attempt.value === "string") {
    return attempt.value.trim();
  }
  return undefined;
}

function extractFrom(
  text: string,
  expect: NonNullable<ExtractOptions["expect"]>,
  depth: number
): ExtractResult {
  const unwrapped =
    depth < MAX_UNWRAP_DEPTH ? unwrapEncodedString(text) : undefined;
  if (unwrapped !== undefined) {
    return extractFrom(unwrapped, expect, depth + 1);
  }

  let lastError: string | undefined;
  let sawStart = false;
  for (let i = 0; i < text.length; i++) {
    if (!isWanted(text[i], expect)) {
      continue;
    }
    sawStart = true;
    const end = findMatchingBracketEnd(text, i);
    if (end < 0) {
      // truncated payload: anything nested inside it is not the answer either
      lastError = lastError ?? "Unclosed JSON bracket";
      break;
    }
    const candidate = text.slice(i, end + 1);
    const parsed = parseWithRepairs(candidate);
    if (parsed.ok) {
      return { found: true, json: parsed.json ?? candidate, value: parsed.value };
    }
    lastError = lastError ?? parsed.error;
    i = end;
  }

  if (!sawStart) {
    const what =
      expect === "object"
        ? "JSON object"
        : expect === "array"
          ? "JSON array"
          : "JSON object or array";
    return { found: false, reason: `No ${what} found in content` };
  }
  return { found: false, reason: lastError ?? "JSON parse failed" };
}

/**
 * Extract the first parseable JSON payload from raw LLM content.
 */
export function extractJson(
  content: string,
  options: ExtractOptions = {}
): ExtractResult {
  const strip = options.stripMarkdownCodeBlock ?? true;
  const text = strip ? stripMarkdownCodeBlock(content) : content.trim();
  if (!text) {
    return { found: false, reason: "Empty content after strip" };
  }
  const expect = options.expect ?? "any";
  const result = extractFrom(text, expect, 0);
  if (!result.found && text.includes('\\"')) {
    // every quote escaped, e.g. a payload copied out of a JSON string
    const unescaped = extractFrom(text.replace(/\\"/g, '"'), expect, 0);
    if (unescaped.found) {
      return unescaped;
    }
  }
  return result;
}
