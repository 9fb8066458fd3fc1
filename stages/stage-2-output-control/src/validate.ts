/**
 * Validator: structural and semantic checks against a decoded value.
 * Nodes are visited depth-first in declaration order; within a node the checks run
 * required -> enum -> range -> identity/references -> custom rules, so the same
 * input always yields the same ordered violation list. Never mutates the value.
 */

import type {
  CustomRule,
  FieldKind,
  FieldSpec,
  IdentityIndex,
  JsonObject,
  JsonValue,
  RuleContext,
  SchemaDescriptor,
  Shape,
  Violation,
} from "../../stage-1-schema/src/index.js";
import { indexIdentities, type DuplicateId } from "./identity.js";
import { childPath, indexPath, ROOT_PATH } from "./paths.js";
import { RULES } from "./violations.js";
import { walkNodes } from "./walk.js";

/** Leaf values of a field with their paths, looking through arrays. */
function leaves(
  value: JsonValue | undefined,
  kind: FieldKind,
  path: string
): Array<{ value: JsonValue; kind: FieldKind; path: string }> {
  if (value === undefined) {
    return [];
  }
  if (kind.type === "array" && Array.isArray(value)) {
    return value.flatMap((item, i) => leaves(item, kind.element, indexPath(path, i)));
  }
  return [{ value, kind, path }];
}

function checkRequired(node: JsonObject, shape: Shape, path: string): Violation[] {
  return shape.fields
    .filter((spec) => spec.required && node[spec.name] === undefined)
    .map((spec) => ({
      path: childPath(path, spec.name),
      rule: RULES.required,
      message: `"${spec.name}" is required on "${shape.name}"`,
    }));
}

function checkEnums(node: JsonObject, shape: Shape, path: string): Violation[] {
  const out: Violation[] = [];
  for (const spec of shape.fields) {
    for (const leaf of leaves(node[spec.name], spec.kind, childPath(path, spec.name))) {
      if (leaf.kind.type !== "enum") {
        continue;
      }
      const allowed = leaf.kind.values.map((v) => v.value);
      if (typeof leaf.value !== "string" || !allowed.includes(leaf.value)) {
        out.push({
          path: leaf.path,
          rule: RULES.enum,
          message: `${JSON.stringify(leaf.value)} is not one of ${allowed
            .map((v) => `"${v}"`)
            .join(", ")}`,
        });
      }
    }
  }
  return out;
}

function rangeViolation(path: string, message: string): Violation {
  return { path, rule: RULES.range, message };
}

function checkArraySize(spec: FieldSpec, value: JsonValue | undefined, path: string): Violation[] {
  if (spec.kind.type !== "array" || !Array.isArray(value)) {
    return [];
  }
  const { minItems, maxItems } = spec.kind;
  if (minItems !== undefined && value.length < minItems) {
    return [rangeViolation(path, `has ${value.length} items, needs at least ${minItems}`)];
  }
  if (maxItems !== undefined && value.length > maxItems) {
    return [rangeViolation(path, `has ${value.length} items, allows at most ${maxItems}`)];
  }
  return [];
}

function checkScalarRange(kind: FieldKind, value: JsonValue, path: string): Violation[] {
  if (kind.type !== "scalar") {
    return [];
  }
  const out: Violation[] = [];
  if (typeof value === "number") {
    if (kind.minimum !== undefined && value < kind.minimum) {
      out.push(rangeViolation(path, `${value} is below the minimum ${kind.minimum}`));
    }
    if (kind.maximum !== undefined && value > kind.maximum) {
      out.push(rangeViolation(path, `${value} is above the maximum ${kind.maximum}`));
    }
  }
  if (typeof value === "string") {
    if (kind.minLength !== undefined && value.length < kind.minLength) {
      out.push(
        rangeViolation(path, `has ${value.length} characters, needs at least ${kind.minLength}`)
      );
    }
    if (kind.maxLength !== undefined && value.length > kind.maxLength) {
      out.push(
        rangeViolation(path, `has ${value.length} characters, allows at most ${kind.maxLength}`)
      );
    }
  }
  return out;
}

function checkRanges(node: JsonObject, shape: Shape, path: string): Violation[] {
  const out: Violation[] = [];
  for (const spec of shape.fields) {
    const fieldPath = childPath(path, spec.name);
    const value = node[spec.name];
    out.push(...checkArraySize(spec, value, fieldPath));
    for (const leaf of leaves(value, spec.kind, fieldPath)) {
      out.push(...checkScalarRange(leaf.kind, leaf.value, leaf.path));
    }
  }
  return out;
}

function checkReferences(
  node: JsonObject,
  shape: Shape,
  path: string,
  index: IdentityIndex,
  duplicates: Map<string, DuplicateId>
): Violation[] {
  const out: Violation[] = [];

  if (shape.idField) {
    const duplicate = duplicates.get(childPath(path, shape.idField));
    if (duplicate) {
      out.push({
        path: duplicate.idPath,
        rule: RULES.identityCollision,
        message: `id "${duplicate.entry.id}" of "${duplicate.entry.shape}" is already used by "${duplicate.first.shape}" at ${duplicate.first.path} in id space "${duplicate.entry.space}"; ids must be unique across all shapes in the space`,
      });
    }
  }

  for (const spec of shape.fields) {
    for (const leaf of leaves(node[spec.name], spec.kind, childPath(path, spec.name))) {
      if (leaf.kind.type !== "ref" || typeof leaf.value !== "string") {
        continue;
      }
      if (!index.resolve(leaf.kind.space, leaf.value)) {
        out.push({
          path: leaf.path,
          rule: RULES.danglingReference,
          message: `"${leaf.value}" does not match the id of any node in id space "${leaf.kind.space}"`,
        });
      }
    }
  }
  return out;
}

/** A rule that throws is reported as a violation at the node it was checking. */
function runRule(rule: CustomRule, node: JsonObject, context: RuleContext): Violation[] {
  try {
    return rule.check(node, context);
  } catch (error) {
    return [
      {
        path: context.path,
        rule: RULES.ruleError,
        message: `rule "${rule.name}" could not be checked: ${
          error instanceof Error ? error.message : String(error)
        }`,
      },
    ];
  }
}

export function validate(
  value: JsonObject,
  schema: SchemaDescriptor,
  customRules: readonly CustomRule[] = []
): Violation[] {
  const { index, duplicates } = indexIdentities(value, schema);
  const duplicatesByPath = new Map(duplicates.map((d) => [d.idPath, d]));
  const violations: Violation[] = [];

  walkNodes(value, schema.root, (node, shape, path) => {
    violations.push(
      ...checkRequired(node, shape, path),
      ...checkEnums(node, shape, path),
      ...checkRanges(node, shape, path),
      ...checkReferences(node, shape, path, index, duplicatesByPath)
    );
    for (const rule of shape.rules) {
      violations.push(...runRule(rule, node, { path, root: value, index }));
    }
  });

  for (const rule of customRules) {
    violations.push(...runRule(rule, value, { path: ROOT_PATH, root: value, index }));
  }

  return violations;
}
