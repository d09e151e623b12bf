/**
 * Schema Index
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 * - *Overrides: Partial input merged over defaults
 *
 * @module config/schema
 */

export {
  type AttentionShapeSchema,
  type AnalysisSliceSchema,
  type MemoryProjectionConfigSchema,
  type AnalysisConfigSchema,
  DEFAULT_ANALYSIS_SLICE,
  DEFAULT_MEMORY_PROJECTION_CONFIG,
  DEFAULT_ANALYSIS_CONFIG,
} from './analysis.schema.js';

export {
  type ChartSizeSchema,
  type ReportConfigSchema,
  DEFAULT_REPORT_CONFIG,
} from './report.schema.js';

export {
  type LogLevelConfigSchema,
  type LogHistoryConfigSchema,
  type ModuleFilterConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_MODULE_FILTER_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

export {
  type AnalyzerConfigSchema,
  type AnalyzerConfigOverrides,
  DEFAULT_ANALYZER_CONFIG,
  createAnalyzerConfig,
} from './analyzer.schema.js';
