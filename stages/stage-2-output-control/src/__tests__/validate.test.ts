import { describe, expect, it } from "vitest";

import {
  arrayOf,
  defineSchema,
  defineShape,
  enumOf,
  idField,
  integer,
  refs,
  string,
  type CustomRule,
  type JsonObject,
} from "../../../stage-1-schema/src/index.js";
import { decodeResponse } from "../decode.js";
import { validate } from "../validate.js";
import { isIdentityCollision } from "../violations.js";
import { receiptSchema, ticketSchema } from "./fixtures.js";

function decoded(raw: string, schema = receiptSchema): JsonObject {
  const result = decodeResponse(raw, schema);
  if (!result.success) {
    throw new Error(result.error.message);
  }
  return result.data;
}

const receipt = (subtotal: string) =>
  decoded(
    `{"items": [{"name": "Pasta", "price": 35.5, "quantity": 2}, {"name": "Wine", "price": 12.2, "quantity": 3}], "subtotal": ${subtotal}, "total": 115}`
  );

describe("validate: aggregate rule", () => {
  it("accepts a subtotal equal to the sum of price × quantity", () => {
    expect(validate(receipt("107.6"), receiptSchema)).toEqual([]);
  });

  it("reports a mismatching subtotal once, at the subtotal", () => {
    expect(validate(receipt("100.0"), receiptSchema)).toEqual([
      {
        path: "subtotal",
        rule: "aggregate_mismatch",
        message: "subtotal is 100 but the sum of price × quantity over items is 107.6",
      },
    ]);
  });

  it("compares exactly, without binary rounding drift", () => {
    const value = decoded(
      '{"items": [{"name": "a", "price": 0.1, "quantity": 1}, {"name": "b", "price": 0.2, "quantity": 1}], "subtotal": 0.3, "total": 0.3}'
    );
    expect(validate(value, receiptSchema)).toEqual([]);
  });
});

describe("validate: rules that cannot run", () => {
  it("reports a throwing rule as a violation at the node it checked", () => {
    const explodes: CustomRule = {
      name: "explodes",
      check() {
        throw new Error("boom");
      },
    };
    expect(validate(receipt("107.6"), receiptSchema, [explodes])).toEqual([
      { path: "$", rule: "rule_error", message: 'rule "explodes" could not be checked: boom' },
    ]);
  });

  it("skips the aggregate when an operand is not a finite number", () => {
    const value: JsonObject = {
      items: [{ name: "a", price: Number.POSITIVE_INFINITY, quantity: 1 }],
      subtotal: 5,
      total: 5,
    };
    expect(validate(value, receiptSchema)).toEqual([]);
  });
});

describe("validate: check order", () => {
  const task = defineShape({
    name: "task",
    fields: [
      idField("id", "work"),
      string("title", { maxLength: 5 }),
      enumOf("status", ["open", "done"]),
      integer("estimate", { minimum: 1, required: false }),
      refs("blockedBy", "work", { required: false }),
    ],
  });
  const board = defineSchema(
    defineShape({ name: "board", fields: [arrayOf("tasks", task, { maxItems: 2 })] })
  );
  const caller: CustomRule = {
    name: "always",
    check: () => [{ path: "$", rule: "custom", message: "checked" }],
  };
  const value: JsonObject = {
    tasks: [{ id: "a", status: "blocked", estimate: 0, blockedBy: ["zzz"] }],
  };

  it("runs required, enum, range, references, then caller rules", () => {
    expect(validate(value, board, [caller])).toEqual([
      { path: "tasks[0].title", rule: "required", message: '"title" is required on "task"' },
      { path: "tasks[0].status", rule: "enum", message: '"blocked" is not one of "open", "done"' },
      { path: "tasks[0].estimate", rule: "range", message: "0 is below the minimum 1" },
      {
        path: "tasks[0].blockedBy[0]",
        rule: "dangling_reference",
        message: '"zzz" does not match the id of any node in id space "work"',
      },
      { path: "$", rule: "custom", message: "checked" },
    ]);
  });

  it("is deterministic and leaves the value untouched", () => {
    const before = JSON.stringify(value);
    const first = validate(value, board, [caller]);
    expect(validate(value, board, [caller])).toEqual(first);
    expect(JSON.stringify(value)).toBe(before);
  });

  it("checks array sizes and string lengths", () => {
    const crowded: JsonObject = {
      tasks: [
        { id: "a", title: "too long", status: "open" },
        { id: "b", title: "ok", status: "open", blockedBy: ["a"] },
        { id: "c", title: "ok", status: "done" },
      ],
    };
    expect(validate(crowded, board)).toEqual([
      { path: "tasks", rule: "range", message: "has 3 items, allows at most 2" },
      {
        path: "tasks[0].title",
        rule: "range",
        message: "has 8 characters, allows at most 5",
      },
    ]);
  });
});

describe("validate: shared id spaces", () => {
  it("flags an id used by a ticket and a subtask", () => {
    const value = decoded(
      '{"tickets": [{"id": "1", "name": "Fix login", "description": "Broken", "priority": "high", "subtasks": [{"id": "1", "name": "Reproduce"}]}]}',
      ticketSchema
    );
    const violations = validate(value, ticketSchema);
    expect(violations).toEqual([
      {
        path: "tickets[0].subtasks[0].id",
        rule: "identity_collision",
        message:
          'id "1" of "subtask" is already used by "ticket" at tickets[0] in id space "work-item"; ids must be unique across all shapes in the space',
      },
    ]);
    expect(violations.every(isIdentityCollision)).toBe(true);
  });

  it("resolves references to either shape", () => {
    const value = decoded(
      '{"tickets": [{"id": "T1", "name": "a", "description": "b", "priority": "low", "subtasks": [{"id": "S1", "name": "s"}]}, {"id": "T2", "name": "c", "description": "d", "priority": "low", "dependencies": ["S1", "T1"]}]}',
      ticketSchema
    );
    expect(validate(value, ticketSchema)).toEqual([]);
  });
});
