import {
  createLogSink,
  type LogLevel,
  type LogStreams,
} from "../../stage-0-model-gateway/src/logger.js";
import type { ExtractionErrorKind } from "./types.js";

export type AttemptOutcome =
  | "valid"
  | "invalid"
  | "decode_failed"
  | "transport_error";

export interface AttemptLog {
  timestamp: string;
  extractionId: string;
  schema: string;
  attempt: number;
  outcome: AttemptOutcome;
  violationCount: number;
  durationMs: number;
  error?: string;
}

export interface OutcomeLog {
  timestamp: string;
  extractionId: string;
  schema: string;
  status: "Succeeded" | ExtractionErrorKind;
  attempts: number;
  durationMs: number;
  totalTokens?: number;
}

export interface ExtractionLogger {
  logAttempt(entry: AttemptLog): void;
  logOutcome(entry: OutcomeLog): void;
}

export function createExtractionLogger(
  level: LogLevel = "info",
  streams?: LogStreams
): ExtractionLogger {
  const sink = createLogSink(level, streams);
  return {
    logAttempt(entry) {
      if (entry.outcome === "transport_error") {
        sink.error({ event: "extraction.attempt", ...entry });
      } else {
        sink.info({ event: "extraction.attempt", ...entry });
      }
    },
    logOutcome(entry) {
      if (entry.status === "Succeeded") {
        sink.info({ event: "extraction.outcome", ...entry });
      } else {
        sink.error({ event: "extraction.outcome", ...entry });
      }
    },
  };
}
