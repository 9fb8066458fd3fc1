import {
  arrayOf,
  defineSchema,
  defineShape,
  enumOf,
  idField,
  integer,
  number,
  refs,
  string,
} from "../../../stage-1-schema/src/index.js";
import { aggregateEquals } from "../rules.js";

const item = defineShape({
  name: "item",
  fields: [
    string("name"),
    number("price", { minimum: 0 }),
    integer("quantity", { minimum: 1 }),
  ],
});

export const receiptSchema = defineSchema(
  defineShape({
    name: "receipt",
    fields: [
      arrayOf("items", item),
      number("subtotal"),
      number("total"),
      enumOf("currency", ["USD", "EUR"], { required: false }),
    ],
    rules: [
      aggregateEquals({
        collection: "items",
        multiply: ["price", "quantity"],
        target: "subtotal",
      }),
    ],
  })
);

const subtask = defineShape({
  name: "subtask",
  fields: [idField("id", "work-item"), string("name")],
});

const ticket = defineShape({
  name: "ticket",
  fields: [
    idField("id", "work-item"),
    string("name"),
    string("description"),
    enumOf("priority", ["high", "medium", "low"]),
    arrayOf("subtasks", subtask, { required: false }),
    refs("dependencies", "work-item", { required: false }),
  ],
});

export const ticketSchema = defineSchema(
  defineShape({ name: "ticket_list", fields: [arrayOf("tickets", ticket)] })
);
