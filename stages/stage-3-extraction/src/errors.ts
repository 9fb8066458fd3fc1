import type { JsonObject, Violation } from "../../stage-1-schema/src/index.js";
import { formatViolation } from "../../stage-2-output-control/src/index.js";
import type {
  AttemptRecord,
  ExtractionErrorKind,
  TransportErrorInfo,
} from "./types.js";

/** Failure of one model call: thrown error, non-2xx or timeout. */
export class TransportError extends Error {
  readonly timeout: boolean;
  readonly status?: number;
  readonly code?: string;

  constructor(
    message: string,
    options: { timeout?: boolean; status?: number; code?: string; cause?: unknown } = {}
  ) {
    super(message);
    this.name = "TransportError";
    this.timeout = options.timeout ?? false;
    this.status = options.status;
    this.code = options.code;
    this.cause = options.cause;
  }

  toInfo(): TransportErrorInfo {
    return {
      name: this.name,
      message: this.message,
      status: this.status,
      code: this.code,
      timeout: this.timeout,
    };
  }
}

export interface ExtractionErrorDetails {
  attempts: AttemptRecord[];
  lastRawResponse?: string;
  lastViolations?: Violation[];
  lastValue?: JsonObject;
}

/** Terminal outcome of a failed extraction; returned, never thrown, by `extract`. */
export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly attempts: AttemptRecord[];
  readonly lastRawResponse?: string;
  readonly lastViolations: Violation[];
  readonly lastValue?: JsonObject;

  constructor(
    kind: ExtractionErrorKind,
    message: string,
    details: ExtractionErrorDetails
  ) {
    super(message);
    this.name = "ExtractionError";
    this.kind = kind;
    this.attempts = details.attempts;
    this.lastRawResponse = details.lastRawResponse;
    this.lastViolations = details.lastViolations ?? [];
    this.lastValue = details.lastValue;
  }

  /** Human-readable diagnostics for fixing the output or the schema by hand. */
  report(): string {
    const lines = [`${this.kind}: ${this.message}`, `Attempts: ${this.attempts.length}`];
    if (this.lastViolations.length > 0) {
      lines.push("Last violations:", ...this.lastViolations.map(formatViolation));
    }
    if (this.lastRawResponse !== undefined) {
      lines.push("Last raw response:", this.lastRawResponse);
    }
    return lines.join("\n");
  }
}
