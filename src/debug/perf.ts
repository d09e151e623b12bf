/**
 * Debug Module - Stage Timing Utilities
 *
 * @module debug/perf
 */

import { log } from './log.js';

export const perf = {
  /**
   * Time an async operation and log its duration at debug level.
   */
  async time<T>(label: string, fn: () => Promise<T>): Promise<{ result: T; durationMs: number }> {
    const start = performance.now();
    const result = await fn();
    const durationMs = performance.now() - start;
    log.debug('Perf', `${label}: ${durationMs.toFixed(2)}ms`);
    return { result, durationMs };
  },

  /**
   * Synchronous counterpart of time() for pure projections.
   */
  timeSync<T>(label: string, fn: () => T): { result: T; durationMs: number } {
    const start = performance.now();
    const result = fn();
    const durationMs = performance.now() - start;
    log.debug('Perf', `${label}: ${durationMs.toFixed(2)}ms`);
    return { result, durationMs };
  },
};
