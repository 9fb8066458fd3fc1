/**
 * Depth-first pre-order walk over the shaped nodes of a value, following field
 * declaration order. Values that are not objects where a shape is declared are
 * skipped; the decoder rejects those before anything else runs.
 */

import type {
  FieldKind,
  JsonObject,
  JsonValue,
  Shape,
} from "../../stage-1-schema/src/index.js";
import { childPath, indexPath, ROOT_PATH } from "./paths.js";

export type NodeVisitor = (node: JsonObject, shape: Shape, path: string) => void;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function walkKind(
  value: JsonValue | undefined,
  kind: FieldKind,
  path: string,
  visit: NodeVisitor
): void {
  if (value === undefined) {
    return;
  }
  if (kind.type === "embedded") {
    if (isJsonObject(value)) {
      walkShape(value, kind.shape(), path, visit);
    }
    return;
  }
  if (kind.type === "array" && Array.isArray(value)) {
    value.forEach((item, i) => walkKind(item, kind.element, indexPath(path, i), visit));
  }
}

function walkShape(
  node: JsonObject,
  shape: Shape,
  path: string,
  visit: NodeVisitor
): void {
  visit(node, shape, path);
  for (const spec of shape.fields) {
    walkKind(node[spec.name], spec.kind, childPath(path, spec.name), visit);
  }
}

export function walkNodes(root: JsonObject, shape: Shape, visit: NodeVisitor): void {
  walkShape(root, shape, ROOT_PATH, visit);
}
