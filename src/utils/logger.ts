/**
 * Structured logger: JSON in production, readable in development.
 *
 * Usage:
 *   import { log } from "../utils/logger.js";
 *   log.info("Job succeeded", { jobId: "a1b2", credential: "3f9c0e12ab45" });
 *   log.warn("Credential cooling", { credential: "3f9c0e12ab45", seconds: 60 });
 *
 * Never pass a raw session token in `extra`; use the credential id.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

const isProduction = process.env.NODE_ENV === "production";
const envLevel = process.env.LOG_LEVEL;
const minLevel: LogLevel = isLogLevel(envLevel)
  ? envLevel
  : process.env.NODE_ENV === "test"
    ? "warn"
    : isProduction ? "info" : "debug";

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

function emit(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  if (isProduction) {
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...extra,
    };
    const line = JSON.stringify(entry);
    if (level === "error") {
      process.stderr.write(line + "\n");
    } else {
      process.stdout.write(line + "\n");
    }
  } else {
    const prefix = `[${level.toUpperCase()}]`;
    const parts: unknown[] = [prefix, message];
    if (extra && Object.keys(extra).length > 0) {
      parts.push(extra);
    }
    if (level === "error") {
      console.error(...parts);
    } else if (level === "warn") {
      console.warn(...parts);
    } else {
      console.log(...parts);
    }
  }
}

export const log = {
  debug: (msg: string, extra?: Record<string, unknown>) => emit("debug", msg, extra),
  info: (msg: string, extra?: Record<string, unknown>) => emit("info", msg, extra),
  warn: (msg: string, extra?: Record<string, unknown>) => emit("warn", msg, extra),
  error: (msg: string, extra?: Record<string, unknown>) => emit("error", msg, extra),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
