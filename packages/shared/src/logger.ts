/**
 * Structured logger shared by the engine and its command-line entry points.
 */

import { LOG_LEVELS, type LogLevel } from "./config.js";

type LogContext = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * `console` routes each level to its matching console method; `stderr` sends
 * every event to stderr so a command can keep stdout for its own output.
 */
export type LogDestination = "console" | "stderr";

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

let minimumLevel: LogLevel = readInitialLevel();
let destination: LogDestination = "console";

/**
 * Minimal, dependency-free structured logger that writes to stdout/stderr.
 */
export const logger = {
  debug(message: string, context?: LogContext): void {
    emit("debug", message, context);
  },
  info(message: string, context?: LogContext): void {
    emit("info", message, context);
  },
  warn(message: string, context?: LogContext): void {
    emit("warn", message, context);
  },
  error(message: string, context?: LogContext): void {
    emit("error", message, context);
  },
};

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

export function setLogDestination(next: LogDestination): void {
  destination = next;
}

export function getLogDestination(): LogDestination {
  return destination;
}

function emit(level: LogLevel, message: string, context?: LogContext): void {
  if (!isEnabled(level)) return;
  const line = formatEvent(level, message, context);
  if (destination === "stderr") {
    console.error(line);
  } else {
    CONSOLE_WRITERS[level](line);
  }
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimumLevel];
}

// Reads the raw variable so importing the logger never loads `.env` or throws;
// callers that want validated settings use loadEnvConfig() and setLogLevel().
function readInitialLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? "info";
}

function formatEvent(level: LogLevel, message: string, context?: LogContext): string {
  const event = {
    ts: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  return JSON.stringify(event);
}
