/**
 * Reusable custom rules for Schema Descriptors.
 */

import type {
  CustomRule,
  JsonObject,
  Violation,
} from "../../stage-1-schema/src/index.js";
import {
  addDecimals,
  compareDecimals,
  formatDecimal,
  multiplyDecimals,
  toDecimal,
  type Decimal,
} from "./decimal.js";
import { childPath } from "./paths.js";
import { RULES } from "./violations.js";
import { isJsonObject } from "./walk.js";

export interface AggregateEqualsOptions {
  /** Array field holding the line items. */
  collection: string;
  /** Fields multiplied per item (e.g. ["price", "quantity"]); one field means a plain sum. */
  multiply: string[];
  /** Field that must equal the aggregate. */
  target: string;
  name?: string;
  description?: string;
}

function itemProduct(item: JsonObject, fields: string[]): Decimal | undefined {
  let product: Decimal = { coefficient: 1n, scale: 0 };
  for (const field of fields) {
    const operand = item[field];
    if (typeof operand !== "number" || !Number.isFinite(operand)) {
      return undefined;
    }
    product = multiplyDecimals(product, toDecimal(operand));
  }
  return product;
}

/**
 * sum(collection[i].f1 × f2 × ...) must equal target, compared exactly.
 * Missing or non-numeric operands skip the check; required/type checks report those.
 */
export function aggregateEquals(options: AggregateEqualsOptions): CustomRule {
  const { collection, multiply, target } = options;
  if (multiply.length === 0) {
    throw new Error("aggregateEquals needs at least one field to multiply");
  }
  const expression = multiply.join(" × ");

  return {
    name: options.name ?? `${target}_equals_sum_of_${collection}`,
    description:
      options.description ??
      `${target} must equal the sum of ${expression} over ${collection}`,
    check(node, context): Violation[] {
      const items = node[collection];
      const declared = node[target];
      if (
        !Array.isArray(items) ||
        typeof declared !== "number" ||
        !Number.isFinite(declared)
      ) {
        return [];
      }

      let sum: Decimal = { coefficient: 0n, scale: 0 };
      for (const item of items) {
        if (!isJsonObject(item)) {
          return [];
        }
        const product = itemProduct(item, multiply);
        if (!product) {
          return [];
        }
        sum = addDecimals(sum, product);
      }

      const expected = toDecimal(declared);
      if (compareDecimals(sum, expected) === 0) {
        return [];
      }
      return [
        {
          path: childPath(context.path, target),
          rule: RULES.aggregateMismatch,
          message: `${target} is ${formatDecimal(expected)} but the sum of ${expression} over ${collection} is ${formatDecimal(sum)}`,
        },
      ];
    },
  };
}
