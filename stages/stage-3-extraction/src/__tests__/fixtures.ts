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
import { aggregateEquals } from "../../../stage-2-output-control/src/index.js";
import { createExtractionLogger } from "../logger.js";
import type { InvokeModel, ModelRequest, ModelResponse } from "../types.js";

export const receiptSchema = defineSchema(
  defineShape({
    name: "receipt",
    fields: [
      arrayOf(
        "items",
        defineShape({
          name: "item",
          fields: [string("name"), number("price"), integer("quantity")],
        })
      ),
      number("subtotal"),
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

export const ticketSchema = defineSchema(
  defineShape({
    name: "ticket_list",
    fields: [
      arrayOf(
        "tickets",
        defineShape({
          name: "ticket",
          fields: [
            idField("id", "work-item"),
            string("name"),
            enumOf("priority", ["high", "medium", "low"]),
            arrayOf("subtasks", subtask, { required: false }),
            refs("dependencies", "work-item", { required: false }),
          ],
        })
      ),
    ],
  })
);

export const VALID_RECEIPT =
  '{"items": [{"name": "Pasta", "price": 35.5, "quantity": 2}, {"name": "Wine", "price": 12.2, "quantity": 3}], "subtotal": 107.6}';

export const silentLogger = createExtractionLogger("silent");

export type Scripted = string | ModelResponse | Error;

/** Replays one scripted answer per call; records every request it receives. */
export function scriptedModel(script: Scripted[]): {
  invokeModel: InvokeModel;
  calls: ModelRequest[];
} {
  const calls: ModelRequest[] = [];
  const invokeModel: InvokeModel = async (request) => {
    calls.push(request);
    const next = script[calls.length - 1];
    if (next === undefined) {
      throw new Error(`no scripted answer for call ${calls.length}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { invokeModel, calls };
}
