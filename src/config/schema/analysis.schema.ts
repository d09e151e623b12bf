/**
 * Analysis Config Schema
 *
 * Problem-size slice used by the scaling and speedup projections, and the
 * fixed inputs of the theoretical memory projection.
 *
 * @module config/schema/analysis
 */

// =============================================================================
// Attention Shape
// =============================================================================

/**
 * Problem-size coordinates other than sequence length.
 */
export interface AttentionShapeSchema {
  batchSize: number;
  numHeads: number;
  headDim: number;
}

// =============================================================================
// Analysis Slice
// =============================================================================

/**
 * Slice of the benchmark table that holds every coordinate but seq_len
 * constant. Scaling series and speedup rows are taken from this slice only.
 */
export type AnalysisSliceSchema = AttentionShapeSchema;

/** Default slice: single batch, 8 heads, head dim 64 */
export const DEFAULT_ANALYSIS_SLICE: AnalysisSliceSchema = {
  batchSize: 1,
  numHeads: 8,
  headDim: 64,
};

// =============================================================================
// Memory Projection
// =============================================================================

export interface MemoryProjectionConfigSchema {
  /** Sequence lengths to project, in plot order */
  seqLens: number[];
  /** Tensor shape used for every projected point */
  shape: AttentionShapeSchema;
  /** Bytes per tensor element (4 = float32) */
  bytesPerElement: number;
}

export const DEFAULT_MEMORY_PROJECTION_CONFIG: MemoryProjectionConfigSchema = {
  seqLens: [128, 256, 512, 1024, 2048, 4096, 8192],
  shape: { batchSize: 1, numHeads: 8, headDim: 64 },
  bytesPerElement: 4,
};

// =============================================================================
// Analysis Config
// =============================================================================

export interface AnalysisConfigSchema {
  slice: AnalysisSliceSchema;
  memory: MemoryProjectionConfigSchema;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfigSchema = {
  slice: DEFAULT_ANALYSIS_SLICE,
  memory: DEFAULT_MEMORY_PROJECTION_CONFIG,
};
