export { selectSlice, describeSlice, findSliceGaps, type SliceGap } from './slice.js';
export {
  computeScaling,
  listScalingSeries,
  SCALING_METRICS,
  type ScalingMetric,
  type ScalingPoint,
  type ScalingSeries,
  type ScalingProjection,
} from './scaling.js';
export {
  computeSpeedup,
  speedupRatio,
  SPEEDUP_UNAVAILABLE,
  OPTIMIZED_VARIANTS,
  type OptimizedVariant,
  type SpeedupRow,
  type SpeedupTable,
} from './speedup.js';
export { projectMemory, memoryFootprint, BYTES_PER_MB, type MemoryPoint, type MemoryProjection } from './memory.js';
export { buildSummary, type Summary, type BestPerformance } from './summary.js';
