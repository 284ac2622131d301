/**
 * Logging for the daemon and client, backed by pino.
 *
 * Components receive the root logger at construction and derive a child
 * tagged with their component name.
 */

import { type Logger, destination, pino } from "pino";

export type { Logger };

/** Levels accepted in configuration */
export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  readonly level?: LogLevel;
  /** Process name recorded on every line */
  readonly name?: string;
}

/**
 * Creates the root logger. Output goes to stderr so the client's stdout
 * stays reserved for command results.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "niri-pilot",
      level: options.level ?? "info",
    },
    destination(2)
  );
}

/** Logger that discards everything, for tests and embedding */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
