/**
 * Structured logger with JSON output support.
 *
 * - JSON lines on stderr when LOG_FORMAT=json, readable lines otherwise
 * - Level filtering via LOG_LEVEL (debug | info | warn | error)
 * - conversation_id and trace_id fields carried by context
 * - Child loggers inherit context
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  conversationId?: string;
  traceId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string, ctx?: LogContext): Logger;
  /** Set persistent context fields (conversationId, traceId, etc.) */
  setContext(ctx: LogContext): void;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from environment. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const normalized = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const minPriority = LEVEL_PRIORITY[resolveMinLevel(minLevel)];
  const useJson = isJsonFormat();
  let context: LogContext = { ...parentContext };

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const timestamp = new Date().toISOString();
    const { conversationId, traceId, ...extraContext } = context;
    const fields: Record<string, unknown> = { ...extraContext, ...data };

    if (useJson) {
      const entry: Record<string, unknown> = {
        timestamp,
        level,
        module: name,
        message,
      };
      if (conversationId) entry.conversation_id = conversationId;
      if (traceId) entry.trace_id = traceId;
      Object.assign(entry, fields);
      console.error(JSON.stringify(entry));
      return;
    }

    const scope = conversationId ? ` [${conversationId}]` : "";
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]${scope}`;
    if (Object.keys(fields).length > 0) {
      console.error(`${prefix} ${message} ${JSON.stringify(fields)}`);
    } else {
      console.error(`${prefix} ${message}`);
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName, ctx) =>
      createLogger(`${name}:${childName}`, resolveMinLevel(minLevel), {
        ...context,
        ...ctx,
      }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
