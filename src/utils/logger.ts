/**
 * @module utils/logger
 * @fileoverview Leveled, component-prefixed logging to stderr.
 *
 * stdout belongs to the MCP stdio protocol when a server runs under a
 * host, so every line goes through `console.error`. Tests swap the sink to
 * capture lines instead of printing them.
 *
 * @example
 * ```ts
 * const log = createLogger("session");
 * log.warn("reconnect scheduled", { endpoint: "memory", delayMs: 2000 });
 * // stderr: WARN [session] reconnect scheduled {"endpoint":"memory","delayMs":2000}
 * ```
 */

import { formatErrorForMcp } from "./errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives one fully formatted line per log call. */
export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Logger for a sub-component, e.g. `session:memory`. Shares level and sink. */
  child(component: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level written. Defaults to the process-wide level. */
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const defaultSink: LogSink = (line) => console.error(line);

/**
 * Parse a `LOG_LEVEL` value. Unknown or missing values fall back to `info`.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

let processLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

/** Change the level of every logger created without an explicit level. */
export function setLogLevel(level: LogLevel): void {
  processLevel = level;
}

function renderDetail(detail: unknown): string {
  if (detail instanceof Error) return formatErrorForMcp(detail);
  if (typeof detail === "string") return detail;
  try {
    return JSON.stringify(detail) ?? String(detail);
  } catch {
    // circular structures and bigints
    return String(detail);
  }
}

/**
 * Create a logger for `component`.
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? defaultSink;

  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    const threshold = options.level ?? processLevel;
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

    const suffix = details.length > 0 ? ` ${details.map(renderDetail).join(" ")}` : "";
    sink(`${level.toUpperCase()} [${component}] ${message}${suffix}`);
  };

  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
    child: (sub) => createLogger(`${component}:${sub}`, options),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
