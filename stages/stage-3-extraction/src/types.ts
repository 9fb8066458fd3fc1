/**
 * Stage 3 Extraction types.
 * The model endpoint is opaque: a request goes in, raw text (or a failure) comes out.
 */

import type {
  CostEstimate,
  Message,
  Usage,
} from "../../stage-0-model-gateway/src/types.js";
import type {
  CustomRule,
  IdentityIndex,
  JsonObject,
  Violation,
} from "../../stage-1-schema/src/index.js";
import type { DecodeError } from "../../stage-2-output-control/src/index.js";
import type { BackoffOptions } from "./backoff.js";
import type { ExtractionError } from "./errors.js";
import type { ExtractionLogger } from "./logger.js";

/** Instructions as plain text, or text plus image attachments as data URIs. */
export type Instructions =
  | string
  | {
      text: string;
      attachments?: string[];
    };

export interface ModelRequest {
  /** Model identifier; the invoker's default when omitted. */
  model?: string;
  messages: Message[];
  responseFormat: "json";
  /** Name of the schema the request was compiled for. */
  schemaName: string;
}

export interface ModelResponse {
  content: string;
  usage?: Usage;
  cost?: CostEstimate;
}

export interface InvokeContext {
  /** 0-based attempt number. */
  attempt: number;
  extractionId: string;
  /** Aborted on caller cancellation or when the attempt times out. */
  signal: AbortSignal;
}

export type InvokeModel = (
  request: ModelRequest,
  context: InvokeContext
) => Promise<string | ModelResponse>;

export interface TransportErrorInfo {
  name: string;
  message: string;
  status?: number;
  code?: string;
  timeout: boolean;
}

export interface AttemptRecord {
  attempt: number;
  kind: "response" | "transport_error";
  startedAt: string;
  durationMs: number;
  rawResponse?: string;
  decodeSuccess: boolean;
  decodeError?: DecodeError;
  violations: Violation[];
  transportError?: TransportErrorInfo;
  usage?: Usage;
  cost?: CostEstimate;
}

export interface ExtractOptions {
  invokeModel: InvokeModel;
  /** Corrective/transport retries after the first call (default 3). */
  maxRetries?: number;
  /** Per-attempt timeout; none when omitted or 0. */
  attemptTimeoutMs?: number;
  /** Run against the root after the schema's own rules. */
  customRules?: readonly CustomRule[];
  signal?: AbortSignal;
  /** Delay before resending after a transport failure. */
  backoff?: Partial<BackoffOptions>;
  logger?: ExtractionLogger;
  model?: string;
}

export type ExtractionOutcome<T = JsonObject> =
  | {
      success: true;
      data: T;
      index: IdentityIndex;
      attempts: AttemptRecord[];
      usage?: Usage;
      cost?: CostEstimate;
    }
  | { success: false; error: ExtractionError };

export type ExtractionErrorKind =
  | "DecodeExhausted"
  | "ValidationExhausted"
  | "TransportExhausted"
  | "Cancelled";
