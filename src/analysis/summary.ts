/**
 * Summary Projection
 *
 * Best-of values per variant over the whole table. Key names are the
 * on-disk names of summary.json.
 *
 * @module analysis/summary
 */

import type { AttentionType, RecordStore } from '../records/index.js';

export interface BestPerformance {
  max_tflops: number;
  max_bandwidth_gbps: number;
  min_latency_ms: number;
}

export interface Summary {
  configurations_tested: number;
  implementations: AttentionType[];
  /** Only variants present in the input; never filled with zeros */
  best_performance: Partial<Record<AttentionType, BestPerformance>>;
}

export function buildSummary(store: RecordStore): Summary {
  const groups = store.groupByType();
  const bestPerformance: Partial<Record<AttentionType, BestPerformance>> = {};

  for (const [type, group] of groups) {
    let maxTflops = -Infinity;
    let maxBandwidth = -Infinity;
    let minLatency = Infinity;
    for (const record of group) {
      maxTflops = Math.max(maxTflops, record.tflops);
      maxBandwidth = Math.max(maxBandwidth, record.bandwidthGbps);
      minLatency = Math.min(minLatency, record.timeMs);
    }
    bestPerformance[type] = {
      max_tflops: maxTflops,
      max_bandwidth_gbps: maxBandwidth,
      min_latency_ms: minLatency,
    };
  }

  return {
    configurations_tested: store.size,
    implementations: [...groups.keys()],
    best_performance: bestPerformance,
  };
}
