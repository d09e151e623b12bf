/**
 * Debug Module - Log History
 *
 * @module debug/history
 */

import type { LogEntry } from './types.js';
import { clearHistory, logHistory } from './state.js';

/**
 * Log history filter
 */
export interface LogHistoryFilter {
  level?: string;
  module?: string;
  last?: number;
}

/**
 * Get log history, optionally filtered by level, module substring or tail length.
 */
export function getLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  let history = [...logHistory];

  const level = filter.level?.toUpperCase();
  if (level) {
    history = history.filter((h) => h.level === level);
  }

  if (filter.module) {
    const m = filter.module.toLowerCase();
    history = history.filter((h) => h.module.toLowerCase().includes(m));
  }

  if (filter.last) {
    history = history.slice(-filter.last);
  }

  return history;
}

export function clearLogHistory(): void {
  clearHistory();
}
