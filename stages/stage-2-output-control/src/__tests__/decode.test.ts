import { describe, expect, it } from "vitest";

import {
  defineSchema,
  defineShape,
  embedded,
  number,
} from "../../../stage-1-schema/src/index.js";
import { decodeResponse } from "../decode.js";
import { createIdentityAllocator } from "../identity.js";
import { receiptSchema, ticketSchema } from "./fixtures.js";

describe("decodeResponse", () => {
  it("coerces scalars that convert without loss", () => {
    const result = decodeResponse(
      '{"items": [{"name": "Tea", "price": "12.5", "quantity": "2"}], "subtotal": 25, "total": 25}',
      receiptSchema
    );
    expect(result.success && result.data).toEqual({
      items: [{ name: "Tea", price: 12.5, quantity: 2 }],
      subtotal: 25,
      total: 25,
    });
  });

  it("treats null as absent and drops undeclared fields", () => {
    const result = decodeResponse(
      '{"items": [], "subtotal": 0, "total": 0, "currency": null, "note": "thanks"}',
      receiptSchema
    );
    expect(result.success && result.data).toEqual({ items: [], subtotal: 0, total: 0 });
  });

  it("leaves missing required fields to the validator", () => {
    const result = decodeResponse('{"items": []}', receiptSchema);
    expect(result).toMatchObject({ success: true, data: { items: [] } });
  });

  it("decodes absent optional arrays to empty arrays", () => {
    const result = decodeResponse(
      '{"tickets": [{"id": 7, "name": "Ship", "description": "Release", "priority": "low"}]}',
      ticketSchema
    );
    expect(result.success && result.data).toEqual({
      tickets: [
        {
          id: "7",
          name: "Ship",
          description: "Release",
          priority: "low",
          subtasks: [],
          dependencies: [],
        },
      ],
    });
  });

  it("fails when a container is not what the schema declares", () => {
    const result = decodeResponse('{"items": "tea", "subtotal": 1, "total": 1}', receiptSchema);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues).toEqual([
        { path: "items", message: "cannot be read as declared: must be array" },
      ]);
    }
  });

  it("reports the index of an element that is not an object", () => {
    const result = decodeResponse('{"items": [5], "subtotal": 1, "total": 1}', receiptSchema);
    expect(!result.success && result.error.issues.map((i) => i.path)).toEqual(["items[0]"]);
  });

  it("rejects a number literal that overflows", () => {
    const result = decodeResponse(
      '{"items": [{"name": "a", "price": 1e400, "quantity": 1}], "subtotal": 5, "total": 5}',
      receiptSchema
    );
    expect(!result.success && result.error.issues).toEqual([
      { path: "items[0].price", message: "cannot be read as declared: number is out of range" },
    ]);
  });

  it("does not read booleans as numbers or strings", () => {
    const result = decodeResponse(
      '{"items": [{"name": true, "price": 1, "quantity": 1}], "subtotal": true, "total": 1}',
      receiptSchema
    );
    expect(!result.success && result.error.issues).toEqual([
      { path: "items[0].name", message: "cannot be read as declared: boolean where string is declared" },
      { path: "subtotal", message: "cannot be read as declared: boolean where number is declared" },
    ]);
  });

  it("fails when the payload is an array of objects", () => {
    const raw = '[{"items": [], "subtotal": 0, "total": 0}]';
    const result = decodeResponse(raw, receiptSchema);
    expect(result).toEqual({
      success: false,
      error: {
        message: 'Payload is an array where "receipt" was declared',
        issues: [{ path: "$", message: 'Payload is an array where "receipt" was declared' }],
        raw,
      },
    });
  });

  it("keeps an all-digit field name as a property in issue paths", () => {
    const yearly = defineSchema(
      defineShape({
        name: "yearly",
        fields: [
          embedded("2024", defineShape({ name: "year", fields: [number("revenue")] })),
        ],
      })
    );
    const result = decodeResponse('{"2024": {"revenue": "lots"}}', yearly);
    expect(!result.success && result.error.issues).toEqual([
      { path: "2024.revenue", message: "cannot be read as declared: must be number" },
    ]);
  });

  it("fails at the root when there is no payload", () => {
    const result = decodeResponse("Sorry, I cannot help with that.", receiptSchema);
    expect(result).toEqual({
      success: false,
      error: {
        message: "No JSON object found in content",
        issues: [{ path: "$", message: "No JSON object found in content" }],
        raw: "Sorry, I cannot help with that.",
      },
    });
  });

  it("mints ids for nodes without one through the given allocator", () => {
    const allocator = createIdentityAllocator();
    const result = decodeResponse(
      '{"tickets": [{"id": "T1", "name": "a", "description": "b", "priority": "high", "subtasks": [{"name": "s"}]}]}',
      ticketSchema,
      { allocator }
    );
    expect(result.success && result.minted).toEqual([
      { space: "work-item", id: "work-item-1", shape: "subtask", path: "tickets[0].subtasks[0]" },
    ]);
    expect(allocator.issued()).toEqual(["work-item-1"]);
  });
});
