/**
 * Response Decoder: raw model text -> candidate value shaped like the descriptor.
 * Only "cannot be read as the declared shape at all" is a DecodeError; missing
 * required fields, bad enum values and the like are left for the validator.
 * Scalars are coerced only without loss: a boolean is never read as a number or
 * string, and a number literal that overflows to Infinity is rejected.
 */

import AjvImport, { type ErrorObject, type ValidateFunction } from "ajv";

import {
  toDecodeSchema,
  type FieldKind,
  type JsonObject,
  type JsonSchema,
  type JsonValue,
  type SchemaDescriptor,
  type Shape,
} from "../../stage-1-schema/src/index.js";
import {
  assignIdentities,
  createIdentityAllocator,
  type IdentityAllocator,
  type IdentityCollision,
  type MintedId,
} from "./identity.js";
import { extractJson } from "./parse.js";
import { childPath, fromInstancePath, indexPath, ROOT_PATH } from "./paths.js";
import { isJsonObject } from "./walk.js";

interface AjvOptions {
  allErrors?: boolean;
  coerceTypes?: boolean;
  strict?: boolean;
}

interface AjvInstance {
  compile(schema: JsonSchema): ValidateFunction;
}

const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (
        AjvImport as unknown as {
          default: new (opts?: AjvOptions) => AjvInstance;
        }
      ).default
) as new (opts?: AjvOptions) => AjvInstance;

const RAW_SNIPPET_LENGTH = 500;

export interface DecodeIssue {
  /** `$` when nothing could be parsed at all. */
  path: string;
  message: string;
}

export interface DecodeError {
  message: string;
  issues: DecodeIssue[];
  /** Leading part of the payload (or raw content) for diagnostics. */
  raw: string;
}

export type DecodeResult<T = JsonObject> =
  | {
      success: true;
      data: T;
      /** Ids the allocator filled in for nodes that had none. */
      minted: MintedId[];
      /** Model-assigned ids bound twice in this result. */
      collisions: IdentityCollision[];
    }
  | { success: false; error: DecodeError };

export interface DecodeOptions {
  /** Shared across retry attempts of one extraction; a fresh one when omitted. */
  allocator?: IdentityAllocator;
}

const validatorCache = new WeakMap<SchemaDescriptor, ValidateFunction>();

function decodeValidator(schema: SchemaDescriptor): ValidateFunction {
  let validate = validatorCache.get(schema);
  if (!validate) {
    const ajv = new AjvConstructor({
      allErrors: true,
      coerceTypes: true,
      strict: false,
    });
    validate = ajv.compile(toDecodeSchema(schema));
    validatorCache.set(schema, validate);
  }
  return validate;
}

function toIssues(errors: ErrorObject[], root: JsonValue | undefined): DecodeIssue[] {
  return errors.map((e) => ({
    path: fromInstancePath(e.instancePath, root),
    message: `cannot be read as declared: ${e.message ?? e.keyword}`,
  }));
}

function declaredType(kind: FieldKind): string {
  return kind.type === "scalar" ? kind.scalar : "string";
}

/** Values ajv would coerce with loss, looked up along the declared shape. */
function lossyKind(value: unknown, kind: FieldKind, path: string): DecodeIssue[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return [{ path, message: "cannot be read as declared: number is out of range" }];
  }
  switch (kind.type) {
    case "embedded":
      return isJsonObject(value) ? lossyShape(value, kind.shape(), path) : [];
    case "array":
      return Array.isArray(value)
        ? value.flatMap((item, i) => lossyKind(item, kind.element, indexPath(path, i)))
        : [];
    default:
      if (typeof value === "boolean" && declaredType(kind) !== "boolean") {
        return [
          {
            path,
            message: `cannot be read as declared: boolean where ${declaredType(kind)} is declared`,
          },
        ];
      }
      return [];
  }
}

function lossyShape(node: JsonObject, shape: Shape, path: string): DecodeIssue[] {
  return shape.fields.flatMap((spec) =>
    lossyKind(node[spec.name], spec.kind, childPath(path, spec.name))
  );
}

function issuesMessage(issues: DecodeIssue[]): string {
  return `Payload does not match the declared shape: ${issues
    .map((i) => `${i.path} ${i.message}`)
    .join("; ")}`;
}

function rootError(message: string, raw: string): DecodeError {
  return {
    message,
    issues: [{ path: ROOT_PATH, message }],
    raw: raw.slice(0, RAW_SNIPPET_LENGTH),
  };
}

/** null means absent: drop null properties and null array items. */
function dropNulls(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null).map(dropNulls);
  }
  if (isJsonObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item !== null) {
        out[key] = dropNulls(item);
      }
    }
    return out;
  }
  return value;
}

function normalizeKind(value: JsonValue, kind: FieldKind): JsonValue {
  if (kind.type === "embedded" && isJsonObject(value)) {
    return normalizeShape(value, kind.shape());
  }
  if (kind.type === "array" && Array.isArray(value)) {
    return value.map((item) => normalizeKind(item, kind.element));
  }
  return value;
}

/**
 * Keep declared fields only, in declaration order; absent optional arrays
 * become []. Other absent fields stay absent.
 */
function normalizeShape(node: JsonObject, shape: Shape): JsonObject {
  const out: JsonObject = {};
  for (const spec of shape.fields) {
    const value = node[spec.name];
    if (value !== undefined) {
      out[spec.name] = normalizeKind(value, spec.kind);
    } else if (!spec.required && spec.kind.type === "array") {
      out[spec.name] = [];
    }
  }
  return out;
}

function toJsonValue(value: unknown): JsonValue | undefined {
  // JSON.parse output after dropNulls/ajv coercion is JSON by construction;
  // the walk re-checks each container as it copies.
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }
  if (isJsonObject(value)) {
    const out: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted !== undefined) out[key] = converted;
    }
    return out;
  }
  return undefined;
}

export function decodeResponse<T = JsonObject>(
  raw: string,
  schema: SchemaDescriptor,
  options: DecodeOptions = {}
): DecodeResult<T> {
  const outer = extractJson(raw);
  if (outer.found && Array.isArray(outer.value) && outer.value.some(isJsonObject)) {
    return {
      success: false,
      error: rootError(
        `Payload is an array where "${schema.root.name}" was declared`,
        outer.json
      ),
    };
  }

  const extracted = extractJson(raw, { expect: "object" });
  if (!extracted.found) {
    return { success: false, error: rootError(extracted.reason, raw) };
  }

  const candidate = dropNulls(extracted.value);
  const lossy = isJsonObject(candidate)
    ? lossyShape(candidate, schema.root, ROOT_PATH)
    : [];
  const validate = decodeValidator(schema);
  const valid = validate(candidate);
  if (lossy.length > 0 || !valid) {
    const lossyPaths = new Set(lossy.map((i) => i.path));
    const issues = [
      ...lossy,
      ...toIssues(valid ? [] : validate.errors ?? [], toJsonValue(candidate)).filter(
        (i) => !lossyPaths.has(i.path)
      ),
    ];
    return {
      success: false,
      error: {
        message: issuesMessage(issues),
        issues,
        raw: extracted.json.slice(0, RAW_SNIPPET_LENGTH),
      },
    };
  }

  const root = toJsonValue(candidate);
  if (!isJsonObject(root)) {
    return {
      success: false,
      error: rootError("Payload root is not a JSON object", extracted.json),
    };
  }

  const value = normalizeShape(root, schema.root);
  const allocator = options.allocator ?? createIdentityAllocator();
  const { minted, collisions } = assignIdentities(value, schema, allocator);

  return {
    success: true,
    data: value as T,
    minted,
    collisions,
  };
}
