/**
 * Speedup Projection
 *
 * Naive latency divided by each optimized variant's latency, per seqLen in
 * the analysis slice. A ratio of 0 means "no data": either side missing,
 * or a variant time that cannot be divided by.
 *
 * @module analysis/speedup
 */

import type { AnalysisSliceSchema } from '../config/schema/index.js';
import type { BenchmarkRecord, RecordStore } from '../records/index.js';
import { selectSlice } from './slice.js';

/** Sentinel ratio for a missing comparison */
export const SPEEDUP_UNAVAILABLE = 0;

export type OptimizedVariant = 'shared' | 'flash';

export const OPTIMIZED_VARIANTS: readonly OptimizedVariant[] = ['shared', 'flash'];

export interface SpeedupRow {
  seqLen: number;
  shared: number;
  flash: number;
}

export interface SpeedupTable {
  rows: SpeedupRow[];
}

export function speedupRatio(naive: BenchmarkRecord | null, variant: BenchmarkRecord | null): number {
  if (!naive || !variant) return SPEEDUP_UNAVAILABLE;
  if (!(variant.timeMs > 0) || !Number.isFinite(naive.timeMs)) return SPEEDUP_UNAVAILABLE;
  const ratio = naive.timeMs / variant.timeMs;
  return Number.isFinite(ratio) ? ratio : SPEEDUP_UNAVAILABLE;
}

/**
 * Rows cover every distinct seqLen in the slice, ascending, including sizes
 * with no naive baseline (both ratios 0 there).
 */
export function computeSpeedup(store: RecordStore, slice: AnalysisSliceSchema): SpeedupTable {
  const sliced = selectSlice(store, slice);

  const rows = sliced.distinct('seqLen').map((seqLen) => {
    const naive = sliced.first({ attentionType: 'naive', seqLen });
    return {
      seqLen,
      shared: speedupRatio(naive, sliced.first({ attentionType: 'shared', seqLen })),
      flash: speedupRatio(naive, sliced.first({ attentionType: 'flash', seqLen })),
    };
  });

  return { rows };
}
