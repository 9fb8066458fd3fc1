import { describe, expect, it } from "vitest";

import { extractJson, removeTrailingCommas } from "../parse.js";

describe("extractJson", () => {
  it("reads a payload inside a markdown code block with prose around it", () => {
    const result = extractJson('Here you go:\n```json\n{"a": 1}\n```\nThanks!');
    expect(result).toEqual({ found: true, json: '{"a": 1}', value: { a: 1 } });
  });

  it("skips leading and trailing prose", () => {
    const result = extractJson('Sure! {"a": {"b": [1, 2]}} hope that helps');
    expect(result.found && result.value).toEqual({ a: { b: [1, 2] } });
  });

  it("ignores brackets inside strings", () => {
    const result = extractJson('{"text": "use } and { freely", "n": 2}');
    expect(result.found && result.value).toEqual({ text: "use } and { freely", n: 2 });
  });

  it("repairs trailing commas", () => {
    const result = extractJson('{"items": [1, 2,], "x": 1,}');
    expect(result.found && result.value).toEqual({ items: [1, 2], x: 1 });
  });

  it("unwraps a payload that was JSON-encoded as a string", () => {
    const result = extractJson('"{\\"total\\": 5}"');
    expect(result.found && result.value).toEqual({ total: 5 });
  });

  it("reads a payload whose quotes are all escaped", () => {
    const result = extractJson('Result: {\\"total\\": 5}', { expect: "object" });
    expect(result.found && result.value).toEqual({ total: 5 });
  });

  it("does not return an inner object of a truncated payload", () => {
    expect(extractJson('{"a": {"b": 1}')).toEqual({
      found: false,
      reason: "Unclosed JSON bracket",
    });
  });

  it("reports missing and empty payloads", () => {
    expect(extractJson("no json here", { expect: "object" })).toEqual({
      found: false,
      reason: "No JSON object found in content",
    });
    expect(extractJson("   ")).toEqual({
      found: false,
      reason: "Empty content after strip",
    });
  });

  it("looks only for the expected container", () => {
    const result = extractJson('x [1, 2] {"a": 1}', { expect: "array" });
    expect(result.found && result.value).toEqual([1, 2]);
  });
});

describe("removeTrailingCommas", () => {
  it("leaves commas inside strings alone", () => {
    expect(removeTrailingCommas('{"a": "x,}", "b": [1,],}')).toBe(
      '{"a": "x,}", "b": [1]}'
    );
  });
});
