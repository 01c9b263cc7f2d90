import { env } from "../config/env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function emit(level: LogLevel, message: string, context: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[env.LOG_LEVEL]) return;

  const serialized = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    message,
    ...context,
  });

  if (level === "error") {
    console.error(serialized);
    return;
  }

  if (level === "warn") {
    console.warn(serialized);
    return;
  }

  console.log(serialized);
}

function createLogger(base: LogContext): Logger {
  return {
    debug: (message, context) => emit("debug", message, { ...base, ...context }),
    info: (message, context) => emit("info", message, { ...base, ...context }),
    warn: (message, context) => emit("warn", message, { ...base, ...context }),
    error: (message, context) => emit("error", message, { ...base, ...context }),
    child: (context) => createLogger({ ...base, ...context }),
  };
}

export const logger: Logger = createLogger({});

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
