export { decodeResponse } from "./decode.js";
export type {
  DecodeError,
  DecodeIssue,
  DecodeOptions,
  DecodeResult,
} from "./decode.js";
export {
  assignIdentities,
  buildIdentityIndex,
  createIdentityAllocator,
  indexIdentities,
  resolveReference,
} from "./identity.js";
export type {
  AssignResult,
  BindOutcome,
  DuplicateId,
  IdentityAllocator,
  IdentityAllocatorOptions,
  IdentityCollision,
  IdentityIndexResult,
  MintedId,
  NodeOwner,
} from "./identity.js";
export {
  extractJson,
  removeTrailingCommas,
  stripMarkdownCodeBlock,
} from "./parse.js";
export type { ExtractOptions, ExtractResult } from "./parse.js";
export { childPath, fromInstancePath, indexPath, ROOT_PATH } from "./paths.js";
export { aggregateEquals } from "./rules.js";
export type { AggregateEqualsOptions } from "./rules.js";
export {
  addDecimals,
  compareDecimals,
  formatDecimal,
  multiplyDecimals,
  toDecimal,
} from "./decimal.js";
export type { Decimal } from "./decimal.js";
export { validate } from "./validate.js";
export { formatViolation, isIdentityCollision, RULES } from "./violations.js";
export type { BuiltInRule } from "./violations.js";
export { isJsonObject, walkNodes } from "./walk.js";
export type { NodeVisitor } from "./walk.js";
