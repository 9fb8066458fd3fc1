import type { Violation } from "../../stage-1-schema/src/index.js";

/** Built-in rule names carried by violations. */
export const RULES = {
  required: "required",
  enum: "enum",
  range: "range",
  danglingReference: "dangling_reference",
  identityCollision: "identity_collision",
  aggregateMismatch: "aggregate_mismatch",
  decodeError: "decode_error",
  ruleError: "rule_error",
} as const;

export type BuiltInRule = (typeof RULES)[keyof typeof RULES];

/** Ids shared between nodes of one id space; repairable by asking for distinct ids. */
export function isIdentityCollision(violation: Violation): boolean {
  return violation.rule === RULES.identityCollision;
}

export function formatViolation(violation: Violation): string {
  return `- ${violation.path} [${violation.rule}]: ${violation.message}`;
}
