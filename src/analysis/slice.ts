/**
 * Analysis Slice
 *
 * @module analysis/slice
 */

import type { AnalysisSliceSchema } from '../config/schema/index.js';
import { ATTENTION_TYPES, type AttentionType, type RecordStore } from '../records/index.js';

/**
 * A variant with no records inside the analysis slice. Non-fatal: the
 * variant's series come out empty and its speedup ratios are 0.
 */
export interface SliceGap {
  kind: 'empty-slice';
  attentionType: AttentionType;
  slice: AnalysisSliceSchema;
  message: string;
}

export function selectSlice(store: RecordStore, slice: AnalysisSliceSchema): RecordStore {
  return store.where({
    batchSize: slice.batchSize,
    numHeads: slice.numHeads,
    headDim: slice.headDim,
  });
}

export function describeSlice(slice: AnalysisSliceSchema): string {
  return `batch=${slice.batchSize}, heads=${slice.numHeads}, dim=${slice.headDim}`;
}

/**
 * List every variant that has zero records in the slice.
 */
export function findSliceGaps(store: RecordStore, slice: AnalysisSliceSchema): SliceGap[] {
  const present = new Set(selectSlice(store, slice).attentionTypes());
  return ATTENTION_TYPES.filter((type) => !present.has(type)).map((attentionType) => ({
    kind: 'empty-slice',
    attentionType,
    slice: { ...slice },
    message: `No ${attentionType} records for slice ${describeSlice(slice)}`,
  }));
}
