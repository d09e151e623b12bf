/**
 * Debug Module - Level and Module Filter Configuration
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';
import { LOG_LEVELS, type LogLevel, type LogLevelValue } from './types.js';
import {
  currentLogLevel,
  disabledModules,
  setCurrentLogLevel,
  setDisabledModules,
  setEnabledModules,
} from './state.js';

const LEVEL_MAP: Record<string, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  setCurrentLogLevel(LEVEL_MAP[level.toLowerCase()] ?? LOG_LEVELS.INFO);
}

/**
 * Get current log level name.
 */
export function getLogLevel(): string {
  for (const [name, value] of Object.entries(LOG_LEVELS)) {
    if (value === currentLogLevel) return name.toLowerCase();
  }
  return 'info';
}

export function isLogLevelName(level: string): boolean {
  return level.toLowerCase() in LEVEL_MAP;
}

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  setEnabledModules(new Set(modules.map((m) => m.toLowerCase())));
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  const next = new Set(disabledModules);
  for (const m of modules) {
    next.add(m.toLowerCase());
  }
  setDisabledModules(next);
}

/**
 * Reset module filters.
 */
export function resetModuleFilters(): void {
  setEnabledModules(new Set());
  setDisabledModules(new Set());
}

/**
 * Apply the debug section of a loaded config.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);
  resetModuleFilters();
  if (config.modules.enabled.length > 0) {
    enableModules(...config.modules.enabled);
  }
  if (config.modules.disabled.length > 0) {
    disableModules(...config.modules.disabled);
  }
}

export type { LogLevel };
