/**
 * Analyzer Config Schema
 *
 * Master configuration composing the analysis, report and debug sections.
 *
 * @module config/schema/analyzer
 */

import type { AnalysisConfigSchema, AttentionShapeSchema, MemoryProjectionConfigSchema } from './analysis.schema.js';
import type { ChartSizeSchema, ReportConfigSchema } from './report.schema.js';
import type { DebugConfigSchema } from './debug.schema.js';

import { DEFAULT_ANALYSIS_CONFIG } from './analysis.schema.js';
import { DEFAULT_REPORT_CONFIG } from './report.schema.js';
import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';

// =============================================================================
// Master Config
// =============================================================================

export interface AnalyzerConfigSchema {
  /** Slice and memory projection inputs */
  analysis: AnalysisConfigSchema;

  /** Chart sizes and report title */
  report: ReportConfigSchema;

  /** Logging */
  debug: DebugConfigSchema;
}

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfigSchema = {
  analysis: DEFAULT_ANALYSIS_CONFIG,
  report: DEFAULT_REPORT_CONFIG,
  debug: DEFAULT_DEBUG_CONFIG,
};

// =============================================================================
// Overrides
// =============================================================================

export interface AnalyzerConfigOverrides {
  analysis?: {
    slice?: Partial<AttentionShapeSchema>;
    memory?: Partial<Omit<MemoryProjectionConfigSchema, 'shape'>> & {
      shape?: Partial<AttentionShapeSchema>;
    };
  };
  report?: Partial<Omit<ReportConfigSchema, 'scaling' | 'speedup' | 'memory'>> & {
    scaling?: Partial<ChartSizeSchema>;
    speedup?: Partial<ChartSizeSchema>;
    memory?: Partial<ChartSizeSchema>;
  };
  debug?: {
    logLevel?: Partial<DebugConfigSchema['logLevel']>;
    logHistory?: Partial<DebugConfigSchema['logHistory']>;
    modules?: Partial<DebugConfigSchema['modules']>;
  };
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create an analyzer configuration with optional overrides.
 *
 * Nested sections are merged field by field; arrays replace rather than
 * concatenate.
 *
 * @example
 * ```typescript
 * const config = createAnalyzerConfig({
 *   analysis: { slice: { numHeads: 16 } },
 * });
 * ```
 */
export function createAnalyzerConfig(overrides?: AnalyzerConfigOverrides): AnalyzerConfigSchema {
  const base = DEFAULT_ANALYZER_CONFIG;
  const analysis = overrides?.analysis;
  const report = overrides?.report;
  const debug = overrides?.debug;

  return {
    analysis: {
      slice: { ...base.analysis.slice, ...analysis?.slice },
      memory: {
        seqLens: [...(analysis?.memory?.seqLens ?? base.analysis.memory.seqLens)],
        shape: { ...base.analysis.memory.shape, ...analysis?.memory?.shape },
        bytesPerElement: analysis?.memory?.bytesPerElement ?? base.analysis.memory.bytesPerElement,
      },
    },
    report: {
      title: report?.title ?? base.report.title,
      scaling: { ...base.report.scaling, ...report?.scaling },
      speedup: { ...base.report.speedup, ...report?.speedup },
      memory: { ...base.report.memory, ...report?.memory },
    },
    debug: {
      logLevel: { ...base.debug.logLevel, ...debug?.logLevel },
      logHistory: { ...base.debug.logHistory, ...debug?.logHistory },
      modules: {
        enabled: [...(debug?.modules?.enabled ?? base.debug.modules.enabled)],
        disabled: [...(debug?.modules?.disabled ?? base.debug.modules.disabled)],
      },
    },
  };
}
