/**
 * Scaling Projection
 *
 * Per-metric, per-variant series of (seqLen, value) inside the analysis
 * slice. Points are emitted as measured: no interpolation, no smoothing,
 * missing sizes are simply absent.
 *
 * @module analysis/scaling
 */

import type { AnalysisSliceSchema } from '../config/schema/index.js';
import { ATTENTION_TYPES, type AttentionType, type BenchmarkRecord, type RecordStore } from '../records/index.js';
import { selectSlice } from './slice.js';

export const SCALING_METRICS = ['latency', 'tflops', 'bandwidth'] as const;

export type ScalingMetric = (typeof SCALING_METRICS)[number];

export interface ScalingPoint {
  seqLen: number;
  value: number;
}

export interface ScalingSeries {
  attentionType: AttentionType;
  metric: ScalingMetric;
  points: ScalingPoint[];
}

export type ScalingProjection = Record<ScalingMetric, Record<AttentionType, ScalingSeries>>;

const METRIC_FIELDS: Record<ScalingMetric, (record: BenchmarkRecord) => number> = {
  latency: (r) => r.timeMs,
  tflops: (r) => r.tflops,
  bandwidth: (r) => r.bandwidthGbps,
};

export function computeScaling(store: RecordStore, slice: AnalysisSliceSchema): ScalingProjection {
  const sliced = selectSlice(store, slice);

  const seriesFor = (metric: ScalingMetric): Record<AttentionType, ScalingSeries> => {
    const read = METRIC_FIELDS[metric];
    const build = (attentionType: AttentionType): ScalingSeries => ({
      attentionType,
      metric,
      // Array.prototype.sort is stable, so duplicate seqLens keep load order
      points: sliced
        .where({ attentionType })
        .records.map((record) => ({ seqLen: record.seqLen, value: read(record) }))
        .sort((a, b) => a.seqLen - b.seqLen),
    });
    return {
      naive: build('naive'),
      shared: build('shared'),
      flash: build('flash'),
    };
  };

  return {
    latency: seriesFor('latency'),
    tflops: seriesFor('tflops'),
    bandwidth: seriesFor('bandwidth'),
  };
}

/**
 * Flatten a projection into a list, metric-major in SCALING_METRICS order.
 */
export function listScalingSeries(projection: ScalingProjection): ScalingSeries[] {
  return SCALING_METRICS.flatMap((metric) => ATTENTION_TYPES.map((type) => projection[metric][type]));
}
