/**
 * Debug Config Schema
 *
 * Log level, history limits and module filters for the debug module.
 *
 * @module config/schema/debug
 */

// =============================================================================
// Log Level Config
// =============================================================================

export interface LogLevelConfigSchema {
  /** Default log level (debug, verbose, info, warn, error, silent) */
  defaultLogLevel: string;
}

export const DEFAULT_LOG_LEVEL_CONFIG: LogLevelConfigSchema = {
  defaultLogLevel: 'info',
};

// =============================================================================
// Log History Config
// =============================================================================

export interface LogHistoryConfigSchema {
  /** Maximum number of log entries to retain in memory */
  maxLogHistoryEntries: number;
}

export const DEFAULT_LOG_HISTORY_CONFIG: LogHistoryConfigSchema = {
  maxLogHistoryEntries: 1000,
};

// =============================================================================
// Module Filter Config
// =============================================================================

/**
 * Module name filters. When `enabled` is non-empty only those modules log.
 */
export interface ModuleFilterConfigSchema {
  enabled: string[];
  disabled: string[];
}

export const DEFAULT_MODULE_FILTER_CONFIG: ModuleFilterConfigSchema = {
  enabled: [],
  disabled: [],
};

// =============================================================================
// Complete Debug Config
// =============================================================================

export interface DebugConfigSchema {
  logLevel: LogLevelConfigSchema;
  logHistory: LogHistoryConfigSchema;
  modules: ModuleFilterConfigSchema;
}

export const DEFAULT_DEBUG_CONFIG: DebugConfigSchema = {
  logLevel: DEFAULT_LOG_LEVEL_CONFIG,
  logHistory: DEFAULT_LOG_HISTORY_CONFIG,
  modules: DEFAULT_MODULE_FILTER_CONFIG,
};
