/**
 * Attention Benchmark Analyzer - Public API
 *
 * @module attention-bench-analyzer
 */

export * from './records/index.js';
export * from './analysis/index.js';
export * from './report/index.js';
export * from './pipeline/index.js';
export * from './config/index.js';
export * from './errors/analyzer-error.js';
export {
  log,
  perf,
  setLogLevel,
  getLogLevel,
  applyDebugConfig,
  getLogHistory,
  clearLogHistory,
  type LogEntry,
} from './debug/index.js';
