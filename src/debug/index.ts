/**
 * Debug Module
 *
 * @module debug
 */

export { log } from './log.js';
export { perf } from './perf.js';
export {
  setLogLevel,
  getLogLevel,
  isLogLevelName,
  enableModules,
  disableModules,
  resetModuleFilters,
  applyDebugConfig,
} from './config.js';
export { getLogHistory, clearLogHistory, type LogHistoryFilter } from './history.js';
export {
  LOG_LEVELS,
  LOG_LEVEL_NAMES,
  type LogLevel,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
} from './types.js';
