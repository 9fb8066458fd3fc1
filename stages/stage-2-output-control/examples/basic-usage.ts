/**
 * Stage 2 Output Control 基础用法（不调模型）：
 * - 把几段"模型原始输出"交给 decodeResponse：容忍 markdown、前后多余文字、null、字符串数字
 * - 解码成功后由 Identity Allocator 给缺少 id 的节点补 id
 * - validate 按固定顺序产出 Violation：必填 → 枚举 → 范围 → 引用 → 自定义规则
 */

import {
  arrayOf,
  defineSchema,
  defineShape,
  idField,
  number,
  integer,
  ref,
  string,
} from "../../stage-1-schema/src/index.js";
import {
  aggregateEquals,
  createIdentityAllocator,
  decodeResponse,
  formatViolation,
  validate,
} from "../src/index.js";

const lineItem = defineShape({
  name: "line_item",
  fields: [
    idField("id", "line"),
    string("name"),
    number("price", { minimum: 0 }),
    integer("quantity", { minimum: 1 }),
    ref("discountOf", "line", {
      required: false,
      description: "For a discount line: the id of the line it applies to",
    }),
  ],
});

const schema = defineSchema(
  defineShape({
    name: "receipt",
    fields: [arrayOf("items", lineItem, { minItems: 1 }), number("subtotal")],
    rules: [
      aggregateEquals({
        collection: "items",
        multiply: ["price", "quantity"],
        target: "subtotal",
      }),
    ],
  })
);

const RAW_RESPONSES = [
  // 合法：markdown 包裹、数字是字符串、缺 id
  'Here is the receipt:\n```json\n{"items": [{"name": "Pasta", "price": "35.5", "quantity": 2}, {"name": "Wine", "price": 12.2, "quantity": 3}], "subtotal": 107.6}\n```',
  // 小计不符 + 悬空引用
  '{"items": [{"id": "L1", "name": "Pasta", "price": 35.5, "quantity": 2, "discountOf": "L9"}], "subtotal": 100}',
  // 无法解码：items 不是数组
  '{"items": "pasta and wine", "subtotal": 107.6}',
];

function main() {
  // 同一次抽取的多次尝试共用一个 allocator：已发出的 id 不会再发
  const allocator = createIdentityAllocator();

  RAW_RESPONSES.forEach((raw, i) => {
    console.log(`\n---------- 原始输出 #${i + 1} ----------`);
    allocator.beginResult();
    const decoded = decodeResponse(raw, schema, { allocator });
    if (!decoded.success) {
      console.log("DecodeError:", decoded.error.message);
      return;
    }
    console.log("Decoded:", JSON.stringify(decoded.data));
    if (decoded.minted.length > 0) {
      console.log("Minted ids:", decoded.minted.map((m) => `${m.path} -> ${m.id}`).join(", "));
    }
    const violations = validate(decoded.data, schema);
    console.log(
      violations.length === 0
        ? "Valid."
        : `Violations:\n${violations.map(formatViolation).join("\n")}`
    );
  });
}

main();
