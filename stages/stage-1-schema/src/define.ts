/**
 * Build and check Schema Descriptors.
 * Definition mistakes throw SchemaDefinitionError up front; a returned descriptor is deep-frozen.
 */

import type {
  ArrayKind,
  CustomRule,
  EmbeddedKind,
  EnumKind,
  EnumValue,
  FieldKind,
  FieldSpec,
  RefKind,
  ScalarKind,
  SchemaDescriptor,
  Shape,
  ShapeDocument,
} from "./types.js";

export class SchemaDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaDefinitionError";
  }
}

const SHAPE_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

export interface FieldOptions {
  /** Defaults to true. */
  required?: boolean;
  description?: string;
}

export interface NumberOptions extends FieldOptions {
  minimum?: number;
  maximum?: number;
}

export interface StringOptions extends FieldOptions {
  minLength?: number;
  maxLength?: number;
}

export interface ArrayOptions extends FieldOptions {
  minItems?: number;
  maxItems?: number;
}

type ShapeSource = Shape | (() => Shape);

function field(name: string, kind: FieldKind, options: FieldOptions): FieldSpec {
  return {
    name,
    kind,
    required: options.required ?? true,
    description: options.description,
  };
}

function isShape(value: FieldKind | Shape): value is Shape {
  return "fields" in value;
}

function toThunk(source: ShapeSource): () => Shape {
  return typeof source === "function" ? source : () => source;
}

/** Element kinds for arrays (`arrayOf("tags", kinds.string())`). */
export const kinds = {
  string(options: Omit<StringOptions, keyof FieldOptions> = {}): ScalarKind {
    return { type: "scalar", scalar: "string", ...options };
  },
  number(options: Omit<NumberOptions, keyof FieldOptions> = {}): ScalarKind {
    return { type: "scalar", scalar: "number", ...options };
  },
  integer(options: Omit<NumberOptions, keyof FieldOptions> = {}): ScalarKind {
    return { type: "scalar", scalar: "integer", ...options };
  },
  boolean(): ScalarKind {
    return { type: "scalar", scalar: "boolean" };
  },
  enum(values: ReadonlyArray<string | EnumValue>): EnumKind {
    return {
      type: "enum",
      values: values.map((v) => (typeof v === "string" ? { value: v } : v)),
    };
  },
  ref(space: string): RefKind {
    return { type: "ref", space };
  },
  embedded(shape: ShapeSource): EmbeddedKind {
    return { type: "embedded", shape: toThunk(shape) };
  },
};

export function string(name: string, options: StringOptions = {}): FieldSpec {
  const { minLength, maxLength, ...rest } = options;
  return field(name, kinds.string({ minLength, maxLength }), rest);
}

export function number(name: string, options: NumberOptions = {}): FieldSpec {
  const { minimum, maximum, ...rest } = options;
  return field(name, kinds.number({ minimum, maximum }), rest);
}

export function integer(name: string, options: NumberOptions = {}): FieldSpec {
  const { minimum, maximum, ...rest } = options;
  return field(name, kinds.integer({ minimum, maximum }), rest);
}

export function boolean(name: string, options: FieldOptions = {}): FieldSpec {
  return field(name, kinds.boolean(), options);
}

export function enumOf(
  name: string,
  values: ReadonlyArray<string | EnumValue>,
  options: FieldOptions = {}
): FieldSpec {
  return field(name, kinds.enum(values), options);
}

export function embedded(
  name: string,
  shape: ShapeSource,
  options: FieldOptions = {}
): FieldSpec {
  return field(name, kinds.embedded(shape), options);
}

/** `of` may be an element kind, a shape, or a thunk returning a shape. */
export function arrayOf(
  name: string,
  of: FieldKind | ShapeSource,
  options: ArrayOptions = {}
): FieldSpec {
  const { minItems, maxItems, ...rest } = options;
  const element: FieldKind =
    typeof of === "function"
      ? kinds.embedded(of)
      : isShape(of)
        ? kinds.embedded(of)
        : of;
  const kind: ArrayKind = { type: "array", element, minItems, maxItems };
  return field(name, kind, rest);
}

export function idField(
  name: string,
  space: string,
  options: Omit<FieldOptions, "required"> = {}
): FieldSpec {
  return field(name, { type: "id", space }, { ...options, required: true });
}

export function ref(
  name: string,
  space: string,
  options: FieldOptions = {}
): FieldSpec {
  return field(name, kinds.ref(space), options);
}

export function refs(
  name: string,
  space: string,
  options: ArrayOptions = {}
): FieldSpec {
  return arrayOf(name, kinds.ref(space), options);
}

function checkBounds(
  where: string,
  low: number | undefined,
  high: number | undefined,
  label: string
): void {
  if (low !== undefined && !Number.isFinite(low)) {
    throw new SchemaDefinitionError(`${where}: ${label} lower bound must be finite`);
  }
  if (high !== undefined && !Number.isFinite(high)) {
    throw new SchemaDefinitionError(`${where}: ${label} upper bound must be finite`);
  }
  if (low !== undefined && high !== undefined && low > high) {
    throw new SchemaDefinitionError(
      `${where}: ${label} lower bound ${low} exceeds upper bound ${high}`
    );
  }
}

function checkKind(where: string, kind: FieldKind): void {
  switch (kind.type) {
    case "scalar":
      checkBounds(where, kind.minimum, kind.maximum, "value");
      checkBounds(where, kind.minLength, kind.maxLength, "length");
      return;
    case "enum": {
      if (kind.values.length === 0) {
        throw new SchemaDefinitionError(`${where}: enum needs at least one value`);
      }
      const seen = new Set<string>();
      for (const { value } of kind.values) {
        if (seen.has(value)) {
          throw new SchemaDefinitionError(
            `${where}: duplicate enum value "${value}"`
          );
        }
        seen.add(value);
      }
      return;
    }
    case "array":
      checkBounds(where, kind.minItems, kind.maxItems, "item count");
      if (kind.element.type === "id") {
        throw new SchemaDefinitionError(
          `${where}: an id field cannot be an array element`
        );
      }
      checkKind(`${where}[]`, kind.element);
      return;
    case "id":
    case "ref":
      if (!kind.space.trim()) {
        throw new SchemaDefinitionError(`${where}: id space tag is empty`);
      }
      return;
    case "embedded":
      return;
  }
}

function freezeKind(kind: FieldKind): void {
  if (kind.type === "enum") {
    kind.values.forEach((v) => Object.freeze(v));
    Object.freeze(kind.values);
  } else if (kind.type === "array") {
    freezeKind(kind.element);
  }
  Object.freeze(kind);
}

export interface ShapeDefinition {
  name: string;
  description?: string;
  document?: ShapeDocument;
  fields: readonly FieldSpec[];
  /** Run by the validator in this order, after the built-in checks. */
  rules?: readonly CustomRule[];
}

export function defineShape(definition: ShapeDefinition): Shape {
  const { name } = definition;
  if (!SHAPE_NAME.test(name)) {
    throw new SchemaDefinitionError(
      `Invalid shape name "${name}": use letters, digits, "_" or "-", starting with a letter`
    );
  }

  const seen = new Set<string>();
  let idField: string | undefined;
  for (const spec of definition.fields) {
    const where = `${name}.${spec.name}`;
    if (!spec.name.trim()) {
      throw new SchemaDefinitionError(`Shape "${name}" has a field with an empty name`);
    }
    if (seen.has(spec.name)) {
      throw new SchemaDefinitionError(`Shape "${name}" declares "${spec.name}" twice`);
    }
    seen.add(spec.name);
    checkKind(where, spec.kind);
    if (spec.kind.type === "id") {
      if (idField !== undefined) {
        throw new SchemaDefinitionError(
          `Shape "${name}" declares two id fields ("${idField}", "${spec.name}")`
        );
      }
      idField = spec.name;
    }
  }

  const fields = definition.fields.map((spec) => {
    const copy: FieldSpec = { ...spec };
    freezeKind(copy.kind);
    return Object.freeze(copy);
  });
  const document = definition.document
    ? Object.freeze({ ...definition.document })
    : undefined;

  return Object.freeze({
    name,
    description: definition.description,
    document,
    fields: Object.freeze(fields),
    rules: Object.freeze([...(definition.rules ?? [])]),
    idField,
  });
}

/** Shapes reachable from a kind, in field order. */
function embeddedShapes(kind: FieldKind): Shape[] {
  if (kind.type === "embedded") {
    return [kind.shape()];
  }
  if (kind.type === "array") {
    return embeddedShapes(kind.element);
  }
  return [];
}

function refSpaces(kind: FieldKind): string[] {
  if (kind.type === "ref") {
    return [kind.space];
  }
  if (kind.type === "array") {
    return refSpaces(kind.element);
  }
  return [];
}

/** Distinct shapes, depth-first pre-order from the root. */
export function collectShapes(root: Shape): Shape[] {
  const byName = new Map<string, Shape>();
  const order: Shape[] = [];

  const visit = (shape: Shape) => {
    const known = byName.get(shape.name);
    if (known) {
      if (known !== shape) {
        throw new SchemaDefinitionError(
          `Two different shapes are both named "${shape.name}"`
        );
      }
      return;
    }
    byName.set(shape.name, shape);
    order.push(shape);
    for (const spec of shape.fields) {
      embeddedShapes(spec.kind).forEach(visit);
    }
  };

  visit(root);
  return order;
}

export function collectIdSpaces(
  shapes: readonly Shape[]
): Record<string, string[]> {
  const spaces: Record<string, string[]> = {};
  for (const shape of shapes) {
    for (const spec of shape.fields) {
      if (spec.kind.type !== "id") {
        continue;
      }
      let names = spaces[spec.kind.space];
      if (!names) {
        names = [];
        spaces[spec.kind.space] = names;
      }
      names.push(shape.name);
    }
  }
  return spaces;
}

export interface SchemaOptions {
  /** Defaults to the root shape's name. */
  name?: string;
  document?: ShapeDocument;
}

export function defineSchema(
  root: Shape,
  options: SchemaOptions = {}
): SchemaDescriptor {
  const shapes = collectShapes(root);
  const idSpaces = collectIdSpaces(shapes);

  for (const shape of shapes) {
    for (const spec of shape.fields) {
      for (const space of refSpaces(spec.kind)) {
        if (!idSpaces[space]) {
          throw new SchemaDefinitionError(
            `${shape.name}.${spec.name} references id space "${space}" but no shape declares an id in it`
          );
        }
      }
    }
  }

  const frozenSpaces: Record<string, readonly string[]> = {};
  for (const [space, names] of Object.entries(idSpaces)) {
    frozenSpaces[space] = Object.freeze(names);
  }

  return Object.freeze({
    name: options.name ?? root.name,
    document: options.document
      ? Object.freeze({ ...options.document })
      : undefined,
    root,
    shapes: Object.freeze(shapes),
    idSpaces: Object.freeze(frozenSpaces),
  });
}

/** Embedded shape of a kind, looking through arrays. */
export function shapeOfKind(kind: FieldKind): Shape | undefined {
  return embeddedShapes(kind)[0];
}
