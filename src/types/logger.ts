/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured fields appended to a log line as JSON */
export type LogMeta = Record<string, unknown>;

/**
 * Anything that logs like @/logger; the pipeline and verifier accept one
 * so tests can capture progress lines.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
