export { createExtractor, extract } from "./controller.js";
export type { Extractor, ExtractorConfig } from "./controller.js";
export {
  compileCorrection,
  compileRequest,
  compileSystemPrompt,
  EXTRACTION_PREAMBLE,
} from "./prompt.js";
export type { CompileOptions, RetryContext } from "./prompt.js";
export { computeBackoff, DEFAULT_BACKOFF, sleep } from "./backoff.js";
export type { BackoffOptions } from "./backoff.js";
export { ExtractionError, TransportError } from "./errors.js";
export type { ExtractionErrorDetails } from "./errors.js";
export { createExtractionLogger } from "./logger.js";
export type {
  AttemptLog,
  AttemptOutcome,
  ExtractionLogger,
  OutcomeLog,
} from "./logger.js";
export { createGatewayInvoker } from "./invoker.js";
export type { GatewayInvokerOptions } from "./invoker.js";
export type {
  AttemptRecord,
  ExtractionErrorKind,
  ExtractionOutcome,
  ExtractOptions,
  Instructions,
  InvokeContext,
  InvokeModel,
  ModelRequest,
  ModelResponse,
  TransportErrorInfo,
} from "./types.js";
