/**
 * Logging
 *
 * Leveled `[LEVEL] message` lines on stderr. stdout belongs to the stdio
 * protocol stream and is never written.
 */

import type { LogLevel } from "../config/settings.js";

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

const TAGS: Record<LogLevel, string> = {
  DEBUG: "[DEBUG]",
  INFO: "[INFO]",
  WARNING: "[WARN]",
  ERROR: "[ERROR]",
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  isEnabled(level: LogLevel): boolean;
}

/** Sink for formatted lines; console.error unless a test swaps it */
export type LogSink = (line: string) => void;

function formatFields(fields: LogFields | undefined): string {
  if (!fields) {
    return "";
  }
  const entries = Object.entries(fields).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return "";
  }
  const normalized = Object.fromEntries(
    entries.map(([key, value]) => [key, value instanceof Error ? value.message : value])
  );
  try {
    return ` ${JSON.stringify(normalized, jsonReplacer)}`;
  } catch {
    // Circular values: fall back per field
    const printable = Object.fromEntries(
      Object.entries(normalized).map(([key, value]) => [key, isSerializable(value) ? value : toText(value)])
    );
    return ` ${JSON.stringify(printable, jsonReplacer)}`;
  }
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/** String form of any value, including null-prototype objects */
export function toText(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function isSerializable(value: unknown): boolean {
  try {
    JSON.stringify(value, jsonReplacer);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a logger that drops messages below `level`
 */
export function createLogger(
  level: LogLevel = "WARNING",
  sink: LogSink = (line) => console.error(line)
): Logger {
  const threshold = SEVERITY[level];

  const write = (at: LogLevel, message: string, fields?: LogFields): void => {
    if (SEVERITY[at] < threshold) {
      return;
    }
    sink(`${TAGS[at]} ${message}${formatFields(fields)}`);
  };

  return {
    debug: (message, fields) => write("DEBUG", message, fields),
    info: (message, fields) => write("INFO", message, fields),
    warn: (message, fields) => write("WARNING", message, fields),
    error: (message, fields) => write("ERROR", message, fields),
    isEnabled: (at) => SEVERITY[at] >= threshold,
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger("ERROR", () => undefined);
