/**
 * Debug Types and Constants
 *
 * @module debug/types
 */

/**
 * Log level values (higher = less verbose)
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/** Lower-case level names accepted by config files and CLI flags */
export const LOG_LEVEL_NAMES = ['debug', 'verbose', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/**
 * Log entry for history
 */
export interface LogEntry {
  time: number;
  perfTime: number;
  level: string;
  module: string;
  message: string;
  data?: unknown;
}
