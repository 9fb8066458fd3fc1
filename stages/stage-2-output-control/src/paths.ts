/** Dotted/indexed paths: `tickets[0].subtasks[1].id`; the root is `$`. */

import type { JsonValue } from "../../stage-1-schema/src/index.js";

export const ROOT_PATH = "$";

export function childPath(parent: string, key: string): string {
  return parent === ROOT_PATH ? key : `${parent}.${key}`;
}

export function indexPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

/**
 * JSON Pointer (ajv `instancePath`) to a dotted/indexed path. With `root`, a
 * segment is an index only where the value at that point is an array, so a
 * property named "2024" stays a property; without it, digit segments are indices.
 */
export function fromInstancePath(pointer: string, root?: JsonValue): string {
  if (!pointer) {
    return ROOT_PATH;
  }
  let path = ROOT_PATH;
  let current: JsonValue | undefined = root;
  for (const raw of pointer.split("/").slice(1)) {
    const segment = raw.replace(/~1/g, "/").replace(/~0/g, "~");
    const isIndex =
      current === undefined ? /^\d+$/.test(segment) : Array.isArray(current);
    path = isIndex ? indexPath(path, Number(segment)) : childPath(path, segment);

    if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (typeof current === "object" && current !== null) {
      current = current[segment];
    } else {
      current = undefined;
    }
  }
  return path;
}
