/**
 * Logger constants
 */

import type { LogLevel } from "@/types";

/** Lower value = more verbose */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Used when LOG_LEVEL is unset or not a known level */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
