/**
 * Stage 1 Schema Descriptor 基础用法：
 * - 用 defineShape / defineSchema 声明工单（ticket）与子任务（subtask）
 * - ticket 与 subtask 共享同一个 id 空间，dependencies 可以指向任意一种
 * - 打印给模型看的文本描述与 JSON Schema（不调模型）
 */

import {
  arrayOf,
  defineSchema,
  defineShape,
  describeSchema,
  enumOf,
  idField,
  refs,
  string,
  toJsonSchema,
} from "../src/index.js";

const subtask = defineShape({
  name: "subtask",
  description: "A concrete step needed to finish a ticket",
  fields: [idField("id", "work-item"), string("name")],
});

const ticket = defineShape({
  name: "ticket",
  fields: [
    idField("id", "work-item"),
    string("name", { description: "Short title" }),
    string("description"),
    enumOf("priority", [
      { value: "high", meaning: "Blocks a release or a customer" },
      { value: "medium" },
      { value: "low" },
    ]),
    arrayOf("subtasks", subtask, { required: false }),
    refs("dependencies", "work-item", {
      required: false,
      description: "Ids of tickets or subtasks that must be finished first",
    }),
  ],
});

const schema = defineSchema(
  defineShape({
    name: "ticket_list",
    fields: [arrayOf("tickets", ticket)],
  }),
  {
    document: {
      version: "1",
      text: "Extract every actionable ticket discussed in the meeting transcript.",
    },
  }
);

console.log("========== describeSchema ==========");
console.log(describeSchema(schema));
console.log("\n========== toJsonSchema ==========");
console.log(JSON.stringify(toJsonSchema(schema), null, 2));
