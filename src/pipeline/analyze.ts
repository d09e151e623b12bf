/**
 * Analysis Pipeline
 *
 * load -> (scaling, speedup, memory, summary) -> assemble -> write.
 * The four projections are independent pure functions over one immutable
 * store. Any failure aborts the run; artifacts already written are left
 * in place.
 *
 * @module pipeline/analyze
 */

import { mkdir } from 'fs/promises';
import { resolve } from 'path';

import type { AnalyzerConfigSchema } from '../config/schema/index.js';
import { getRuntimeConfig } from '../config/runtime.js';
import { log, perf } from '../debug/index.js';
import { ArtifactWriteError } from '../errors/analyzer-error.js';
import { loadRecordStore, type RecordStore } from '../records/index.js';
import {
  buildSummary,
  computeScaling,
  computeSpeedup,
  describeSlice,
  findSliceGaps,
  projectMemory,
  type MemoryProjection,
  type ScalingProjection,
  type SliceGap,
  type SpeedupTable,
  type Summary,
} from '../analysis/index.js';
import {
  ARTIFACT_NAMES,
  buildMemoryFigure,
  buildScalingFigure,
  buildSpeedupFigure,
  formatReport,
  formatSummaryJson,
  renderFigure,
  writeArtifacts,
  type Artifact,
} from '../report/index.js';

export interface AnalyzeOptions {
  /** Path of the benchmark CSV */
  csvPath: string;
  /** Output directory; created (recursively) if absent */
  outputDir: string;
  /** Defaults to the active runtime config */
  config?: AnalyzerConfigSchema;
}

export interface Projections {
  scaling: ScalingProjection;
  speedup: SpeedupTable;
  memory: MemoryProjection;
  summary: Summary;
  gaps: SliceGap[];
}

export interface AnalysisResult extends Projections {
  outputDir: string;
  /** Absolute paths, in write order */
  artifacts: string[];
  recordCount: number;
  skippedRows: number;
}

/**
 * Compute every projection for a loaded store.
 */
export function computeProjections(store: RecordStore, config: AnalyzerConfigSchema): Projections {
  const { slice, memory } = config.analysis;

  const gaps = findSliceGaps(store, slice);
  for (const gap of gaps) {
    log.warn('Analyze', gap.message);
  }

  return {
    scaling: perf.timeSync('scaling', () => computeScaling(store, slice)).result,
    speedup: perf.timeSync('speedup', () => computeSpeedup(store, slice)).result,
    memory: perf.timeSync('memory', () => projectMemory(memory.seqLens, memory.shape, memory.bytesPerElement)).result,
    summary: perf.timeSync('summary', () => buildSummary(store)).result,
    gaps,
  };
}

/**
 * Render every artifact from computed projections, in write order.
 */
export function assembleArtifacts(projections: Projections, config: AnalyzerConfigSchema): Artifact[] {
  const { report } = config;
  return [
    { name: ARTIFACT_NAMES.scaling, content: renderFigure(buildScalingFigure(projections.scaling, report)) },
    { name: ARTIFACT_NAMES.speedup, content: renderFigure(buildSpeedupFigure(projections.speedup, report)) },
    { name: ARTIFACT_NAMES.memory, content: renderFigure(buildMemoryFigure(projections.memory, report)) },
    { name: ARTIFACT_NAMES.summary, content: formatSummaryJson(projections.summary) },
    { name: ARTIFACT_NAMES.report, content: formatReport(projections.summary, report) },
  ];
}

export async function runAnalysis(options: AnalyzeOptions): Promise<AnalysisResult> {
  const config = options.config ?? getRuntimeConfig();
  const outputDir = resolve(options.outputDir);

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new ArtifactWriteError(outputDir, err);
  }

  log.info('Analyze', `Loading results from ${options.csvPath}`);
  const { result: store } = await perf.time('load', () => loadRecordStore(options.csvPath));
  log.info('Analyze', `Loaded ${store.size} records; slice ${describeSlice(config.analysis.slice)}`);

  const projections = computeProjections(store, config);
  const artifacts = assembleArtifacts(projections, config);

  const { result: paths } = await perf.time('write', () => writeArtifacts(outputDir, artifacts));
  log.info('Analyze', `Analysis complete! Results saved to ${outputDir}`);

  return {
    ...projections,
    outputDir,
    artifacts: paths,
    recordCount: store.size,
    skippedRows: store.skipped.length,
  };
}
