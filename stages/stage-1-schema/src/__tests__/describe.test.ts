import { describe, expect, it } from "vitest";

import {
  arrayOf,
  defineSchema,
  defineShape,
  describeSchema,
  enumOf,
  idField,
  integer,
  number,
  refs,
  string,
  toDecodeSchema,
  toJsonSchema,
} from "../index.js";

const item = defineShape({
  name: "item",
  fields: [
    string("name"),
    number("price", { minimum: 0 }),
    integer("quantity", { minimum: 1 }),
  ],
});

const receipt = defineSchema(
  defineShape({
    name: "receipt",
    description: "A shop receipt",
    fields: [
      arrayOf("items", item, { minItems: 1 }),
      number("subtotal"),
      enumOf("currency", [{ value: "USD", meaning: "US dollars" }, "EUR"], {
        required: false,
      }),
    ],
  })
);

describe("describeSchema", () => {
  it("renders every shape with fields, kinds and enum meanings", () => {
    expect(describeSchema(receipt)).toBe(
      [
        'Schema "receipt" (root shape "receipt")',
        "",
        'Shape "receipt": A shop receipt',
        "Fields:",
        '- items (array of object "item", required, at least 1 items)',
        "- subtotal (number, required)",
        "- currency (enum, optional)",
        "  one of:",
        '    - "USD": US dollars',
        '    - "EUR"',
        "",
        'Shape "item"',
        "Fields:",
        "- name (string, required)",
        "- price (number (minimum 0), required)",
        "- quantity (integer (minimum 1), required)",
      ].join("\n")
    );
  });

  it("is deterministic", () => {
    expect(describeSchema(receipt)).toBe(describeSchema(receipt));
  });

  it("renders the schema document and shared id spaces", () => {
    const subtask = defineShape({
      name: "subtask",
      fields: [idField("id", "work-item")],
    });
    const ticket = defineShape({
      name: "ticket",
      fields: [
        idField("id", "work-item"),
        arrayOf("subtasks", subtask, { required: false }),
        refs("dependencies", "work-item", { required: false }),
      ],
    });
    const schema = defineSchema(ticket, {
      name: "tickets",
      document: { version: "2", text: "One ticket per action item." },
    });

    const text = describeSchema(schema);
    expect(text.startsWith(
      'Schema "tickets" (root shape "ticket")\nDocument (v2):\nOne ticket per action item.\n\n'
    )).toBe(true);
    expect(text).toContain(
      '- dependencies (array of reference to space "work-item", optional)'
    );
    expect(text.endsWith(
      'Shared id spaces:\n- "work-item": "ticket", "subtask". Every id must be unique across all of these shapes; a reference to "work-item" holds one of these ids.'
    )).toBe(true);
  });
});

describe("toJsonSchema", () => {
  it("renders definitions with required fields and constraints", () => {
    expect(toJsonSchema(receipt)).toEqual({
      $ref: "#/definitions/receipt",
      definitions: {
        receipt: {
          type: "object",
          description: "A shop receipt",
          properties: {
            items: {
              type: "array",
              items: { $ref: "#/definitions/item" },
              minItems: 1,
            },
            subtotal: { type: "number" },
            currency: { type: "string", enum: ["USD", "EUR"] },
          },
          required: ["items", "subtotal"],
          additionalProperties: false,
        },
        item: {
          type: "object",
          properties: {
            name: { type: "string" },
            price: { type: "number", minimum: 0 },
            quantity: { type: "integer", minimum: 1 },
          },
          required: ["name", "price", "quantity"],
          additionalProperties: false,
        },
      },
    });
  });

  it("keeps only types in the decode schema", () => {
    const definitions = toDecodeSchema(receipt).definitions;
    expect(definitions).toEqual({
      receipt: {
        type: "object",
        properties: {
          items: { type: "array", items: { $ref: "#/definitions/item" } },
          subtotal: { type: "number" },
          currency: { type: "string" },
        },
      },
      item: {
        type: "object",
        properties: {
          name: { type: "string" },
          price: { type: "number" },
          quantity: { type: "integer" },
        },
      },
    });
  });
});
