/**
 * Stage 1 Schema Descriptor types.
 * A descriptor is pure data: it says what a model answer must look like and never
 * does any I/O. Custom rules are the only functions it carries.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** JSON Schema (draft-07 style), rendered from a descriptor. */
export type JsonSchema = Record<string, unknown>;

export type ScalarType = "string" | "number" | "integer" | "boolean";

export interface ScalarKind {
  type: "scalar";
  scalar: ScalarType;
  /** Inclusive bounds, numbers only. */
  minimum?: number;
  maximum?: number;
  /** Strings only. */
  minLength?: number;
  maxLength?: number;
}

export interface EnumValue {
  value: string;
  /** Rendered into the prompt so the model knows when to pick this value. */
  meaning?: string;
}

export interface EnumKind {
  type: "enum";
  values: readonly EnumValue[];
}

export interface ArrayKind {
  type: "array";
  element: FieldKind;
  minItems?: number;
  maxItems?: number;
}

export interface EmbeddedKind {
  type: "embedded";
  /** Thunk so a shape can embed itself or a shape declared after it. */
  shape: () => Shape;
}

/** The node's own identity in a shared id space. At most one per shape. */
export interface IdKind {
  type: "id";
  space: string;
}

/** Holds the id of some node (any shape) in a shared id space. */
export interface RefKind {
  type: "ref";
  space: string;
}

export type FieldKind =
  | ScalarKind
  | EnumKind
  | ArrayKind
  | EmbeddedKind
  | IdKind
  | RefKind;

export interface FieldSpec {
  name: string;
  kind: FieldKind;
  required: boolean;
  description?: string;
}

/** Free-text guidance for the model, rendered verbatim. */
export interface ShapeDocument {
  version: string;
  text: string;
}

/** One failed constraint. `path` is dotted/indexed from the root; the root is `$`. */
export interface Violation {
  path: string;
  rule: string;
  message: string;
}

/** A node that carries an id in a shared id space. */
export interface IndexedNode {
  space: string;
  id: string;
  shape: string;
  path: string;
  node: JsonObject;
}

/** id -> node lookup for one extraction result, per shared id space. */
export interface IdentityIndex {
  resolve(space: string, id: string): IndexedNode | undefined;
  /** Every indexed node of a space (or of all spaces), in document order. */
  entries(space?: string): IndexedNode[];
}

export interface RuleContext {
  /** Path of the node the rule runs against (`$` for the root). */
  path: string;
  root: JsonObject;
  index: IdentityIndex;
}

/**
 * Cross-field check attached to a shape (or passed by the caller for the root).
 * Returns an empty list when the node is fine.
 */
export interface CustomRule {
  name: string;
  /** Rendered into the schema description when present. */
  description?: string;
  check(node: JsonObject, context: RuleContext): Violation[];
}

export interface Shape {
  readonly name: string;
  readonly description?: string;
  readonly document?: ShapeDocument;
  readonly fields: readonly FieldSpec[];
  readonly rules: readonly CustomRule[];
  /** Name of the id field, when the shape belongs to a shared id space. */
  readonly idField?: string;
}

export interface SchemaDescriptor {
  readonly name: string;
  readonly document?: ShapeDocument;
  readonly root: Shape;
  /** Every distinct shape, depth-first in declaration order, root first. */
  readonly shapes: readonly Shape[];
  /** space tag -> names of the shapes drawing ids from it. */
  readonly idSpaces: Readonly<Record<string, readonly string[]>>;
}
