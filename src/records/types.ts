/**
 * Benchmark Record Types
 *
 * @module records/types
 */

/** Kernel variants, in plotting and reporting order */
export const ATTENTION_TYPES = ['naive', 'shared', 'flash'] as const;

export type AttentionType = (typeof ATTENTION_TYPES)[number];

/**
 * One measured run of one kernel variant at one problem size.
 */
export interface BenchmarkRecord {
  attentionType: AttentionType;
  batchSize: number;
  numHeads: number;
  headDim: number;
  seqLen: number;
  /** Wall-clock latency, milliseconds */
  timeMs: number;
  /** Achieved compute throughput */
  tflops: number;
  /** Achieved memory bandwidth, GB/s */
  bandwidthGbps: number;
}

/** Problem-size coordinates of a record */
export type CoordinateField = 'batchSize' | 'numHeads' | 'headDim' | 'seqLen';

export type RecordMatch = Partial<Pick<BenchmarkRecord, CoordinateField | 'attentionType'>>;

/**
 * A data row dropped at load time because the runner could not measure it.
 */
export interface SkippedRow {
  /** 1-based line in the source, header included */
  row: number;
  reason: string;
}

export function isAttentionType(value: string): value is AttentionType {
  return (ATTENTION_TYPES as readonly string[]).includes(value);
}
