/**
 * Identity Allocator: one id pool per shared id space, across every shape in it.
 * Model-assigned ids are bound as-is (references were written against them);
 * nodes without one get a minted id. Minted ids are never handed out twice by
 * the same allocator, even across retry attempts, and never take an id that a
 * reference in the current result already names.
 */

import type {
  FieldKind,
  IdentityIndex,
  IndexedNode,
  JsonObject,
  JsonValue,
  SchemaDescriptor,
  Shape,
} from "../../stage-1-schema/src/index.js";
import { childPath } from "./paths.js";
import { walkNodes } from "./walk.js";

export interface NodeOwner {
  shape: string;
  path: string;
}

export interface IdentityCollision {
  space: string;
  id: string;
  /** Node that bound the id first (document order). */
  first: NodeOwner;
  second: NodeOwner;
}

export type BindOutcome =
  | { bound: true }
  | { bound: false; collision: IdentityCollision };

export interface MintedId {
  space: string;
  id: string;
  shape: string;
  path: string;
}

export interface IdentityAllocator {
  /**
   * Fresh id for a space: never previously minted, and neither bound nor
   * reserved in the current result.
   */
  nextId(space: string): string;
  /** Bind an id to a node of the current result. */
  bind(space: string, id: string, owner: NodeOwner): BindOutcome;
  /** Keep an id out of minting for the current result (e.g. a reference target). */
  reserve(space: string, id: string): void;
  /** Start a new candidate result: drop bindings and reservations, keep everything minted so far. */
  beginResult(): void;
  /** Ids minted so far, in order. */
  issued(space?: string): string[];
}

export interface IdentityAllocatorOptions {
  /** Id format for the n-th candidate (1-based). Defaults to `${space}-${n}`. */
  format?: (space: string, n: number) => string;
}

export function createIdentityAllocator(
  options: IdentityAllocatorOptions = {}
): IdentityAllocator {
  const format = options.format ?? ((space: string, n: number) => `${space}-${n}`);
  const bindings = new Map<string, Map<string, NodeOwner>>();
  const reserved = new Set<string>();
  const minted: Array<{ space: string; id: string }> = [];
  const mintedKeys = new Set<string>();
  const counters = new Map<string, number>();

  function spaceBindings(space: string): Map<string, NodeOwner> {
    let map = bindings.get(space);
    if (!map) {
      map = new Map();
      bindings.set(space, map);
    }
    return map;
  }

  const key = (space: string, id: string) => JSON.stringify([space, id]);

  return {
    nextId(space: string): string {
      const bound = spaceBindings(space);
      let n = counters.get(space) ?? 0;
      let candidate: string;
      do {
        n += 1;
        candidate = format(space, n);
      } while (
        bound.has(candidate) ||
        mintedKeys.has(key(space, candidate)) ||
        reserved.has(key(space, candidate))
      );
      counters.set(space, n);
      minted.push({ space, id: candidate });
      mintedKeys.add(key(space, candidate));
      return candidate;
    },

    bind(space: string, id: string, owner: NodeOwner): BindOutcome {
      const bound = spaceBindings(space);
      const existing = bound.get(id);
      if (existing) {
        return {
          bound: false,
          collision: { space, id, first: existing, second: owner },
        };
      }
      bound.set(id, owner);
      return { bound: true };
    },

    reserve(space: string, id: string): void {
      reserved.add(key(space, id));
    },

    beginResult(): void {
      bindings.clear();
      reserved.clear();
    },

    issued(space?: string): string[] {
      return minted
        .filter((entry) => space === undefined || entry.space === space)
        .map((entry) => entry.id);
    },
  };
}

interface IdNode {
  node: JsonObject;
  shape: Shape;
  path: string;
  space: string;
  idField: string;
}

function idNodes(value: JsonObject, schema: SchemaDescriptor): IdNode[] {
  const out: IdNode[] = [];
  walkNodes(value, schema.root, (node, shape, path) => {
    const spec = shape.fields.find((f) => f.name === shape.idField);
    if (spec && spec.kind.type === "id") {
      out.push({ node, shape, path, space: spec.kind.space, idField: spec.name });
    }
  });
  return out;
}

function refLeaves(
  value: JsonValue | undefined,
  kind: FieldKind,
  out: Array<{ space: string; id: string }>
): void {
  if (kind.type === "ref" && typeof value === "string") {
    out.push({ space: kind.space, id: value });
  } else if (kind.type === "array" && Array.isArray(value)) {
    for (const item of value) {
      refLeaves(item, kind.element, out);
    }
  }
}

/** Every reference value in the result, in document order. */
function referencedIds(
  value: JsonObject,
  schema: SchemaDescriptor
): Array<{ space: string; id: string }> {
  const out: Array<{ space: string; id: string }> = [];
  walkNodes(value, schema.root, (node, shape) => {
    for (const spec of shape.fields) {
      refLeaves(node[spec.name], spec.kind, out);
    }
  });
  return out;
}

/** Non-blank string id of a node, if it has one. */
function currentId(node: JsonObject, idField: string): string | undefined {
  const id = node[idField];
  return typeof id === "string" && id.trim() !== "" ? id : undefined;
}

export interface AssignResult {
  minted: MintedId[];
  collisions: IdentityCollision[];
}

/**
 * Bind every model-assigned id (document order), reserve every referenced id,
 * then mint ids for nodes that lack one. Mutates `value` by filling in the
 * minted ids.
 */
export function assignIdentities(
  value: JsonObject,
  schema: SchemaDescriptor,
  allocator: IdentityAllocator
): AssignResult {
  const nodes = idNodes(value, schema);
  const collisions: IdentityCollision[] = [];
  const minted: MintedId[] = [];

  for (const entry of nodes) {
    const id = currentId(entry.node, entry.idField);
    if (id === undefined) {
      continue;
    }
    const outcome = allocator.bind(entry.space, id, {
      shape: entry.shape.name,
      path: entry.path,
    });
    if (!outcome.bound) {
      collisions.push(outcome.collision);
    }
  }

  for (const ref of referencedIds(value, schema)) {
    allocator.reserve(ref.space, ref.id);
  }

  for (const entry of nodes) {
    if (currentId(entry.node, entry.idField) !== undefined) {
      continue;
    }
    const id = allocator.nextId(entry.space);
    entry.node[entry.idField] = id;
    allocator.bind(entry.space, id, { shape: entry.shape.name, path: entry.path });
    minted.push({ space: entry.space, id, shape: entry.shape.name, path: entry.path });
  }

  return { minted, collisions };
}

export interface DuplicateId {
  entry: IndexedNode;
  /** First node holding the same id. */
  first: IndexedNode;
  /** Path of the duplicate's id field. */
  idPath: string;
}

export interface IdentityIndexResult {
  index: IdentityIndex;
  duplicates: DuplicateId[];
}

/**
 * id -> (shape, node) lookup per space. The first node holding an id wins;
 * later holders are reported as duplicates.
 */
export function indexIdentities(
  value: JsonObject,
  schema: SchemaDescriptor
): IdentityIndexResult {
  const bySpace = new Map<string, Map<string, IndexedNode>>();
  const ordered: IndexedNode[] = [];
  const duplicates: DuplicateId[] = [];

  for (const entry of idNodes(value, schema)) {
    const id = currentId(entry.node, entry.idField);
    if (id === undefined) {
      continue;
    }
    let ids = bySpace.get(entry.space);
    if (!ids) {
      ids = new Map();
      bySpace.set(entry.space, ids);
    }
    const indexed: IndexedNode = {
      space: entry.space,
      id,
      shape: entry.shape.name,
      path: entry.path,
      node: entry.node,
    };
    const first = ids.get(id);
    if (first) {
      duplicates.push({
        entry: indexed,
        first,
        idPath: childPath(entry.path, entry.idField),
      });
      continue;
    }
    ids.set(id, indexed);
    ordered.push(indexed);
  }

  const index: IdentityIndex = {
    resolve(space: string, id: string) {
      return bySpace.get(space)?.get(id);
    },
    entries(space?: string) {
      return ordered.filter((e) => space === undefined || e.space === space);
    },
  };

  return { index, duplicates };
}

export function buildIdentityIndex(
  value: JsonObject,
  schema: SchemaDescriptor
): IdentityIndex {
  return indexIdentities(value, schema).index;
}

export function resolveReference(
  index: IdentityIndex,
  space: string,
  id: string
): IndexedNode | undefined {
  return index.resolve(space, id);
}
