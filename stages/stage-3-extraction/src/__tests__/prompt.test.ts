import { describe, expect, it } from "vitest";

import {
  describeSchema,
  toJsonSchema,
} from "../../../stage-1-schema/src/index.js";
import { compileCorrection, compileRequest, EXTRACTION_PREAMBLE } from "../prompt.js";
import { receiptSchema, ticketSchema } from "./fixtures.js";

describe("compileRequest", () => {
  it("puts schema text, JSON Schema and output rules in the system message", () => {
    const request = compileRequest(receiptSchema, "Extract the receipt.");
    expect(request.responseFormat).toBe("json");
    expect(request.schemaName).toBe("receipt");
    expect(request.messages).toHaveLength(2);

    const [system, user] = request.messages;
    expect(system.role).toBe("system");
    expect(system.content).toBe(
      [
        EXTRACTION_PREAMBLE,
        describeSchema(receiptSchema),
        `JSON Schema:\n${JSON.stringify(toJsonSchema(receiptSchema), null, 2)}`,
        [
          "Output format:",
          "- Respond with exactly one JSON object that conforms to the JSON Schema above.",
          "- Do not wrap it in markdown and do not add any text before or after it.",
          "- Leave out optional fields you have no value for; never invent values.",
        ].join("\n"),
      ].join("\n\n")
    );
    expect(user).toEqual({ role: "user", content: "Extract the receipt." });
  });

  it("adds id rules when the schema has shared id spaces", () => {
    const [system] = compileRequest(ticketSchema, "x").messages;
    expect(system.content).toContain(
      "- Every id must be unique within its id space, across all shapes sharing it.\n- Every reference must hold the id of a node present in your answer."
    );
  });

  it("sends attachments as image parts after the text", () => {
    const request = compileRequest(receiptSchema, {
      text: "Read this receipt.",
      attachments: ["data:image/png;base64,AAAA"],
    });
    expect(request.messages[1]).toEqual({
      role: "user",
      content: [
        { type: "text", text: "Read this receipt." },
        { type: "image", dataUri: "data:image/png;base64,AAAA" },
      ],
    });
  });

  it("replays the prior answer and lists the violations on retry", () => {
    const prior = '{"items": [], "subtotal": 100}';
    const request = compileRequest(receiptSchema, "Extract the receipt.", {
      priorResponse: prior,
      violations: [
        { path: "subtotal", rule: "aggregate_mismatch", message: "subtotal is 100 but the sum is 0" },
      ],
    });

    expect(request.messages.slice(0, 2)).toEqual(
      compileRequest(receiptSchema, "Extract the receipt.").messages
    );
    expect(request.messages[2]).toEqual({ role: "assistant", content: prior });
    expect(request.messages[3]).toEqual({
      role: "user",
      content: [
        "Your previous answer did not pass validation. Problems found:",
        "- subtotal [aggregate_mismatch]: subtotal is 100 but the sum is 0",
        "",
        "Correct exactly the fields listed above and keep every other field as it was.",
        "Return the complete corrected JSON object, not only the changed fields.",
      ].join("\n"),
    });
  });

  it("is deterministic", () => {
    const retry = { priorResponse: "{}", violations: [] };
    expect(compileRequest(ticketSchema, "x", retry)).toEqual(
      compileRequest(ticketSchema, "x", retry)
    );
  });
});

describe("compileCorrection", () => {
  it("asks for distinct ids when ids collide", () => {
    const text = compileCorrection([
      { path: "tickets[0].subtasks[0].id", rule: "identity_collision", message: "dup" },
    ]);
    expect(text.split("\n")).toContain(
      "Give each colliding node its own distinct id and update any references that pointed at it."
    );
  });
});
