/**
 * Retry Controller: compile -> invoke -> decode -> validate, with corrective retries.
 * Attempts run strictly in sequence. Decode and validation failures are fed back
 * to the model; transport failures resend the same request after a backoff.
 * At most `maxRetries + 1` model calls per extraction.
 */

import { randomUUID } from "node:crypto";

import { EXTRACTION_DEFAULTS } from "../../../config/index.js";
import { sumCosts } from "../../stage-0-model-gateway/src/cost.js";
import { describeError } from "../../stage-0-model-gateway/src/gateway.js";
import { isLogLevel } from "../../stage-0-model-gateway/src/logger.js";
import { createMergedSignal } from "../../stage-0-model-gateway/src/signal.js";
import type { Usage } from "../../stage-0-model-gateway/src/types.js";
import type {
  JsonObject,
  SchemaDescriptor,
  Violation,
} from "../../stage-1-schema/src/index.js";
import {
  buildIdentityIndex,
  createIdentityAllocator,
  decodeResponse,
  RULES,
  validate,
  type DecodeError,
} from "../../stage-2-output-control/src/index.js";
import { computeBackoff, sleep, type BackoffOptions } from "./backoff.js";
import { ExtractionError, TransportError } from "./errors.js";
import {
  createExtractionLogger,
  type AttemptOutcome,
  type ExtractionLogger,
} from "./logger.js";
import { compileRequest } from "./prompt.js";
import type {
  AttemptRecord,
  ExtractionErrorKind,
  ExtractionOutcome,
  ExtractOptions,
  Instructions,
  InvokeModel,
  ModelRequest,
  ModelResponse,
} from "./types.js";

function nowIso(): string {
  return new Date().toISOString();
}

type InvokeResult =
  | { kind: "response"; response: ModelResponse }
  | { kind: "transport_error"; error: TransportError }
  | { kind: "cancelled" };

function toModelResponse(result: string | ModelResponse): ModelResponse {
  return typeof result === "string" ? { content: result } : result;
}

/** Settles with the promise, or rejects as soon as the signal aborts. */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new TransportError("Model call aborted"));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

async function invokeOnce(
  invokeModel: InvokeModel,
  request: ModelRequest,
  context: { attempt: number; extractionId: string },
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): Promise<InvokeResult> {
  const merged = createMergedSignal(signal, timeoutMs);
  const attemptSignal = merged.signal ?? new AbortController().signal;
  try {
    const result = await raceAbort(
      invokeModel(request, { ...context, signal: attemptSignal }),
      merged.signal
    );
    const response = toModelResponse(result);
    if (typeof response.content !== "string") {
      return {
        kind: "transport_error",
        error: new TransportError("Model returned no text content"),
      };
    }
    return { kind: "response", response };
  } catch (error) {
    if (signal?.aborted) {
      return { kind: "cancelled" };
    }
    if (merged.timedOut()) {
      return {
        kind: "transport_error",
        error: new TransportError(`Model call timed out after ${timeoutMs}ms`, {
          timeout: true,
          cause: error,
        }),
      };
    }
    if (error instanceof TransportError) {
      return { kind: "transport_error", error };
    }
    const info = describeError(error);
    return {
      kind: "transport_error",
      error: new TransportError(info.message, {
        status: info.status,
        code: info.code,
        cause: error,
      }),
    };
  } finally {
    merged.cancel();
  }
}

function decodeViolations(error: DecodeError): Violation[] {
  return error.issues.map((issue) => ({
    path: issue.path,
    rule: RULES.decodeError,
    message: issue.message,
  }));
}

function sumUsage(attempts: AttemptRecord[]): Usage | undefined {
  const known = attempts
    .map((a) => a.usage)
    .filter((u): u is Usage => u !== undefined);
  if (known.length === 0) {
    return undefined;
  }
  return {
    inputTokens: known.reduce((sum, u) => sum + u.inputTokens, 0),
    outputTokens: known.reduce((sum, u) => sum + u.outputTokens, 0),
    totalTokens: known.reduce((sum, u) => sum + u.totalTokens, 0),
  };
}

function exhaustedMessage(kind: ExtractionErrorKind, attempts: number): string {
  switch (kind) {
    case "DecodeExhausted":
      return `No decodable response after ${attempts} attempt(s)`;
    case "ValidationExhausted":
      return `Response still has violations after ${attempts} attempt(s)`;
    case "TransportExhausted":
      return `Model call failed on the last of ${attempts} attempt(s)`;
    case "Cancelled":
      return `Extraction cancelled after ${attempts} attempt(s)`;
  }
}

export async function extract<T = JsonObject>(
  schema: SchemaDescriptor,
  instructions: Instructions,
  options: ExtractOptions
): Promise<ExtractionOutcome<T>> {
  if (typeof options.invokeModel !== "function") {
    throw new TypeError("extract: invokeModel is required");
  }
  const maxRetries = options.maxRetries ?? EXTRACTION_DEFAULTS.maxRetries;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(
      `extract: maxRetries must be a non-negative integer, got ${maxRetries}`
    );
  }

  const { invokeModel, signal, attemptTimeoutMs } = options;
  const customRules = options.customRules ?? [];
  const logger = options.logger ?? createExtractionLogger(EXTRACTION_DEFAULTS.logLevel);
  const extractionId = randomUUID();
  const started = Date.now();
  const allocator = createIdentityAllocator();
  const attempts: AttemptRecord[] = [];

  let request = compileRequest(schema, instructions, undefined, {
    model: options.model,
  });
  let lastKind: "decode" | "validation" | "transport" = "transport";
  let lastRawResponse: string | undefined;
  let lastViolations: Violation[] = [];
  let lastValue: JsonObject | undefined;
  let transportStreak = 0;

  const record = (entry: AttemptRecord, outcome: AttemptOutcome) => {
    attempts.push(entry);
    logger.logAttempt({
      timestamp: nowIso(),
      extractionId,
      schema: schema.name,
      attempt: entry.attempt,
      outcome,
      violationCount: entry.violations.length,
      durationMs: entry.durationMs,
      error: entry.transportError?.message ?? entry.decodeError?.message,
    });
  };

  const fail = (kind: ExtractionErrorKind): ExtractionOutcome<T> => {
    logger.logOutcome({
      timestamp: nowIso(),
      extractionId,
      schema: schema.name,
      status: kind,
      attempts: attempts.length,
      durationMs: Date.now() - started,
      totalTokens: sumUsage(attempts)?.totalTokens,
    });
    return {
      success: false,
      error: new ExtractionError(kind, exhaustedMessage(kind, attempts.length), {
        attempts,
        lastRawResponse,
        lastViolations,
        lastValue,
      }),
    };
  };

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      return fail("Cancelled");
    }

    const attemptStarted = Date.now();
    const startedAt = new Date(attemptStarted).toISOString();
    const result = await invokeOnce(
      invokeModel,
      request,
      { attempt, extractionId },
      signal,
      attemptTimeoutMs
    );
    if (result.kind === "cancelled") {
      return fail("Cancelled");
    }

    if (result.kind === "transport_error") {
      lastKind = "transport";
      transportStreak += 1;
      record(
        {
          attempt,
          kind: "transport_error",
          startedAt,
          durationMs: Date.now() - attemptStarted,
          decodeSuccess: false,
          violations: [],
          transportError: result.error.toInfo(),
        },
        "transport_error"
      );
      if (attempt < maxRetries) {
        await sleep(computeBackoff(transportStreak, options.backoff), signal);
      }
      continue;
    }

    transportStreak = 0;
    const { content, usage, cost } = result.response;
    lastRawResponse = content;
    allocator.beginResult();
    const decoded = decodeResponse<JsonObject>(content, schema, { allocator });

    if (!decoded.success) {
      lastKind = "decode";
      lastViolations = decodeViolations(decoded.error);
      record(
        {
          attempt,
          kind: "response",
          startedAt,
          durationMs: Date.now() - attemptStarted,
          rawResponse: content,
          decodeSuccess: false,
          decodeError: decoded.error,
          violations: lastViolations,
          usage,
          cost,
        },
        "decode_failed"
      );
      request = compileRequest(
        schema,
        instructions,
        { priorResponse: content, violations: lastViolations },
        { model: options.model }
      );
      continue;
    }

    const violations = validate(decoded.data, schema, customRules);
    lastValue = decoded.data;
    record(
      {
        attempt,
        kind: "response",
        startedAt,
        durationMs: Date.now() - attemptStarted,
        rawResponse: content,
        decodeSuccess: true,
        violations,
        usage,
        cost,
      },
      violations.length === 0 ? "valid" : "invalid"
    );

    if (violations.length === 0) {
      if (signal?.aborted) {
        return fail("Cancelled");
      }
      const total = sumUsage(attempts);
      logger.logOutcome({
        timestamp: nowIso(),
        extractionId,
        schema: schema.name,
        status: "Succeeded",
        attempts: attempts.length,
        durationMs: Date.now() - started,
        totalTokens: total?.totalTokens,
      });
      return {
        success: true,
        data: decoded.data as T,
        index: buildIdentityIndex(decoded.data, schema),
        attempts,
        usage: total,
        cost: sumCosts(attempts.map((a) => a.cost)),
      };
    }

    lastKind = "validation";
    lastViolations = violations;
    request = compileRequest(
      schema,
      instructions,
      { priorResponse: content, violations },
      { model: options.model }
    );
  }

  if (signal?.aborted) {
    return fail("Cancelled");
  }
  switch (lastKind) {
    case "decode":
      return fail("DecodeExhausted");
    case "validation":
      return fail("ValidationExhausted");
    case "transport":
      return fail("TransportExhausted");
  }
}

export interface ExtractorConfig {
  invokeModel: InvokeModel;
  maxRetries?: number;
  attemptTimeoutMs?: number;
  backoff?: Partial<BackoffOptions>;
  logLevel?: string;
  logger?: ExtractionLogger;
  model?: string;
}

export interface Extractor {
  extract<T = JsonObject>(
    schema: SchemaDescriptor,
    instructions: Instructions,
    options?: Partial<ExtractOptions>
  ): Promise<ExtractionOutcome<T>>;
}

/** Bind the model call, defaults and logger once; per-call options override them. */
export function createExtractor(config: ExtractorConfig): Extractor {
  if (typeof config.invokeModel !== "function") {
    throw new TypeError("createExtractor: invokeModel is required");
  }
  const logLevel = isLogLevel(config.logLevel)
    ? config.logLevel
    : EXTRACTION_DEFAULTS.logLevel;
  const logger = config.logger ?? createExtractionLogger(logLevel);

  return {
    extract<T = JsonObject>(
      schema: SchemaDescriptor,
      instructions: Instructions,
      options: Partial<ExtractOptions> = {}
    ) {
      return extract<T>(schema, instructions, {
        invokeModel: config.invokeModel,
        maxRetries: config.maxRetries,
        attemptTimeoutMs: config.attemptTimeoutMs,
        backoff: config.backoff,
        logger,
        model: config.model,
        ...options,
      });
    },
  };
}
