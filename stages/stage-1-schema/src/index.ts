export {
  arrayOf,
  boolean,
  collectIdSpaces,
  collectShapes,
  defineSchema,
  defineShape,
  embedded,
  enumOf,
  idField,
  integer,
  kinds,
  number,
  ref,
  refs,
  SchemaDefinitionError,
  shapeOfKind,
  string,
} from "./define.js";
export type {
  ArrayOptions,
  FieldOptions,
  NumberOptions,
  SchemaOptions,
  ShapeDefinition,
  StringOptions,
} from "./define.js";
export { describeSchema, renderKind } from "./describe.js";
export { toDecodeSchema, toJsonSchema } from "./json-schema.js";
export type { JsonSchemaOptions } from "./json-schema.js";
export type {
  ArrayKind,
  CustomRule,
  EmbeddedKind,
  EnumKind,
  EnumValue,
  FieldKind,
  FieldSpec,
  IdentityIndex,
  IdKind,
  IndexedNode,
  JsonObject,
  JsonPrimitive,
  JsonSchema,
  JsonValue,
  RefKind,
  RuleContext,
  ScalarKind,
  ScalarType,
  SchemaDescriptor,
  Shape,
  ShapeDocument,
  Violation,
} from "./types.js";
