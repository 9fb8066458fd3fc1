import type {
  ErrorLog,
  RequestLog,
  RequestLogger,
  ResponseLog,
} from "./types.js";

export type LogLevel = "silent" | "error" | "info";

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "info"];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Writes one JSON object per line; `info` to stdout, `error` to stderr. */
export interface LogSink {
  info(entry: object): void;
  error(entry: object): void;
}

export interface LogStreams {
  out(line: string): void;
  err(line: string): void;
}

const CONSOLE_STREAMS: LogStreams = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function createLogSink(
  level: LogLevel = "info",
  streams: LogStreams = CONSOLE_STREAMS
): LogSink {
  return {
    info(entry) {
      if (level === "info") {
        streams.out(JSON.stringify(entry));
      }
    },
    error(entry) {
      if (level === "info" || level === "error") {
        streams.err(JSON.stringify(entry));
      }
    },
  };
}

export function createConsoleLogger(
  level: LogLevel = "info",
  streams?: LogStreams
): RequestLogger {
  const sink = createLogSink(level, streams);
  return {
    logRequest(entry: RequestLog) {
      sink.info({ event: "gateway.request", ...entry });
    },
    logResponse(entry: ResponseLog) {
      sink.info({ event: "gateway.response", ...entry });
    },
    logError(entry: ErrorLog) {
      sink.error({ event: "gateway.error", ...entry });
    },
  };
}
