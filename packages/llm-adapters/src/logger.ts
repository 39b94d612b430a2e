/**
 * Structured logging over pino.
 *
 * Adapters take a `Logger` in their options and log through child loggers
 * bound to their provider name. Nothing here touches process-wide state
 * except the lazily created `defaultLogger()`.
 */

import {
  pino,
  type DestinationStream,
  type Logger as PinoInstance,
  type LoggerOptions,
} from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LogContext {
  provider?: string;
  model?: string;
  operation?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: LogContext): void;
  info(message: string, meta?: LogContext): void;
  warn(message: string, meta?: LogContext): void;
  error(message: string, error?: unknown, meta?: LogContext): void;
  /** A logger whose lines all carry `bindings`. */
  child(bindings: LogContext): Logger;
  /** Start a timer; the returned function logs the elapsed time at debug. */
  timer(operation: string): () => void;
}

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Where lines go. Defaults to stdout. */
  destination?: DestinationStream;
  /** Static fields on every line. */
  base?: Record<string, unknown>;
}

class PinoLogger implements Logger {
  constructor(private readonly p: PinoInstance) {}

  debug(message: string, meta?: LogContext): void {
    this.p.debug(meta ?? {}, message);
  }

  info(message: string, meta?: LogContext): void {
    this.p.info(meta ?? {}, message);
  }

  warn(message: string, meta?: LogContext): void {
    this.p.warn(meta ?? {}, message);
  }

  error(message: string, error?: unknown, meta?: LogContext): void {
    const data = { ...(meta ?? {}), ...(error !== undefined ? { err: error } : {}) };
    this.p.error(data, message);
  }

  child(bindings: LogContext): Logger {
    return new PinoLogger(this.p.child(bindings));
  }

  timer(operation: string): () => void {
    const start = Date.now();
    return () =>
      this.debug("Operation completed", {
        operation,
        duration: Date.now() - start,
      });
  }
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const opts: LoggerOptions = {
    level: options.level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: { level: (label) => ({ level: label }) },
    redact: ["apiKey", "key", "token", "authorization", "headers.authorization", 'headers["x-api-key"]'],
    serializers: { err: pino.stdSerializers.err },
    base: { service: "llm-adapters", ...(options.base ?? {}) },
  };
  const instance = options.destination
    ? pino(opts, options.destination)
    : pino(opts);
  return new PinoLogger(instance);
}

/** A logger that discards everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });

let fallback: Logger | undefined;

/** Shared logger for callers that do not pass one. Level from `LLM_LOG_LEVEL`. */
export function defaultLogger(): Logger {
  if (!fallback) {
    fallback = createLogger({ level: parseLogLevel(process.env.LLM_LOG_LEVEL) });
  }
  return fallback;
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return LEVELS.find((level) => level === value) ?? "info";
}
