/**
 * Render a Schema Descriptor as JSON Schema (draft-07).
 * Every shape lives under `definitions` so recursive shapes need no special case.
 */

import type {
  FieldKind,
  JsonSchema,
  SchemaDescriptor,
  Shape,
} from "./types.js";

export interface JsonSchemaOptions {
  /**
   * Types only: drop `required`, enums and range keywords. The decoder uses this
   * so that semantic problems are left to the validator.
   */
  typesOnly?: boolean;
}

function withDefined(entries: Record<string, unknown>): JsonSchema {
  const out: JsonSchema = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function definitionRef(shape: Shape): JsonSchema {
  return { $ref: `#/definitions/${shape.name}` };
}

function kindSchema(
  kind: FieldKind,
  options: JsonSchemaOptions,
  description?: string
): JsonSchema {
  const full = !options.typesOnly;
  switch (kind.type) {
    case "scalar":
      return withDefined({
        type: kind.scalar,
        description,
        minimum: full ? kind.minimum : undefined,
        maximum: full ? kind.maximum : undefined,
        minLength: full ? kind.minLength : undefined,
        maxLength: full ? kind.maxLength : undefined,
      });
    case "enum":
      return withDefined({
        type: "string",
        description,
        enum: full ? kind.values.map((v) => v.value) : undefined,
      });
    case "array":
      return withDefined({
        type: "array",
        description,
        items: kindSchema(kind.element, options),
        minItems: full ? kind.minItems : undefined,
        maxItems: full ? kind.maxItems : undefined,
      });
    case "embedded":
      return definitionRef(kind.shape());
    case "id":
      return withDefined({
        type: "string",
        description:
          description ?? `Unique id in shared id space "${kind.space}"`,
      });
    case "ref":
      return withDefined({
        type: "string",
        description:
          description ?? `Id of a node in shared id space "${kind.space}"`,
      });
  }
}

function shapeSchema(shape: Shape, options: JsonSchemaOptions): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  for (const spec of shape.fields) {
    properties[spec.name] = kindSchema(spec.kind, options, spec.description);
  }
  const required = shape.fields.filter((f) => f.required).map((f) => f.name);
  return withDefined({
    type: "object",
    description: options.typesOnly ? undefined : shape.description,
    properties,
    required: !options.typesOnly && required.length > 0 ? required : undefined,
    additionalProperties: options.typesOnly ? undefined : false,
  });
}

export function toJsonSchema(
  schema: SchemaDescriptor,
  options: JsonSchemaOptions = {}
): JsonSchema {
  const definitions: Record<string, JsonSchema> = {};
  for (const shape of schema.shapes) {
    definitions[shape.name] = shapeSchema(shape, options);
  }
  return { ...definitionRef(schema.root), definitions };
}

/** Types-only schema used when decoding. */
export function toDecodeSchema(schema: SchemaDescriptor): JsonSchema {
  return toJsonSchema(schema, { typesOnly: true });
}
