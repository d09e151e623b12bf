/**
 * Figure Builders
 *
 * Turn projections into FigureSpecs. Pure: same projection in, same spec out.
 *
 * @module report/figures
 */

import type { ReportConfigSchema } from '../config/schema/index.js';
import type { MemoryProjection, ScalingMetric, ScalingProjection, SpeedupTable } from '../analysis/index.js';
import { OPTIMIZED_VARIANTS } from '../analysis/index.js';
import { ATTENTION_TYPES } from '../records/index.js';
import type { AxisScale, BarSeriesSpec, FigureSpec, LineSeriesSpec, PanelSpec } from './figure-types.js';
import { GRID_OPACITY, MEMORY_STYLES, REFERENCE_LINE_COLOR, VARIANT_STYLES, type VariantStyle } from './styles.js';

export const FIGURE_IDS = {
  scaling: 'scaling_analysis',
  speedup: 'speedup_comparison',
  memory: 'memory_scaling',
} as const;

const SEQ_LEN_LABEL = 'Sequence Length';
const LOG2: AxisScale = { type: 'log', base: 2 };
const LOG10: AxisScale = { type: 'log', base: 10 };
const LINEAR: AxisScale = { type: 'linear' };

interface ScalingPanelLayout {
  metric: ScalingMetric;
  title: string;
  yLabel: string;
  yScale: AxisScale;
}

const SCALING_PANELS: ScalingPanelLayout[] = [
  { metric: 'latency', title: 'Latency Scaling', yLabel: 'Latency (ms)', yScale: LOG10 },
  { metric: 'tflops', title: 'Throughput Scaling', yLabel: 'TFLOPS', yScale: LINEAR },
  { metric: 'bandwidth', title: 'Memory Bandwidth', yLabel: 'Bandwidth (GB/s)', yScale: LINEAR },
];

function emptyPanel(title: string, x: PanelSpec['x'], y: PanelSpec['y']): PanelSpec {
  return {
    title,
    x,
    y,
    series: [],
    referenceLines: [],
    annotations: [],
    gridOpacity: GRID_OPACITY,
    gridAxis: 'both',
  };
}

/**
 * Three panels: latency (log-log), throughput and bandwidth (log x).
 * One line per variant per panel; empty variants keep their legend entry.
 */
export function buildScalingFigure(scaling: ScalingProjection, config: ReportConfigSchema): FigureSpec {
  const panels = SCALING_PANELS.map(({ metric, title, yLabel, yScale }) => {
    const panel = emptyPanel(title, { label: SEQ_LEN_LABEL, scale: LOG2 }, { label: yLabel, scale: yScale });
    panel.series = ATTENTION_TYPES.map((type): LineSeriesSpec => {
      const style = VARIANT_STYLES[type];
      return {
        kind: 'line',
        label: style.label,
        color: style.color,
        marker: style.marker,
        strokeWidth: 1.5,
        points: scaling[metric][type].points.map((p) => ({ x: p.seqLen, y: p.value })),
      };
    });
    return panel;
  });

  return { id: FIGURE_IDS.scaling, ...config.scaling, panels };
}

/**
 * Grouped bars, one (shared, flash) pair per seqLen, with a dashed
 * break-even line at ratio 1.
 */
export function buildSpeedupFigure(speedup: SpeedupTable, config: ReportConfigSchema): FigureSpec {
  const categories = speedup.rows.map((row) => String(row.seqLen));
  const panel = emptyPanel(
    'Attention Kernel Speedup Comparison',
    { label: SEQ_LEN_LABEL, scale: { type: 'category', categories } },
    { label: 'Speedup vs Naive', scale: LINEAR }
  );

  panel.gridAxis = 'y';
  panel.series = OPTIMIZED_VARIANTS.map((variant): BarSeriesSpec => ({
    kind: 'bar',
    label: VARIANT_STYLES[variant].label,
    color: VARIANT_STYLES[variant].color,
    values: speedup.rows.map((row) => row[variant]),
  }));
  panel.referenceLines = [{ y: 1, color: REFERENCE_LINE_COLOR, dashed: true, opacity: 0.5 }];

  return { id: FIGURE_IDS.speedup, ...config.speedup, panels: [panel] };
}

export function formatMegabytes(mb: number): string {
  return `${mb.toFixed(0)} MB`;
}

/**
 * Standard vs flash footprint, log-log, with the last point of each curve
 * annotated in MB.
 */
export function buildMemoryFigure(memory: MemoryProjection, config: ReportConfigSchema): FigureSpec {
  const panel = emptyPanel(
    'Memory Scaling: Standard vs Flash Attention',
    { label: SEQ_LEN_LABEL, scale: LOG2 },
    { label: 'Memory (MB)', scale: LOG10 }
  );

  const curve = (style: VariantStyle, pick: 'standardMb' | 'flashMb'): LineSeriesSpec => ({
    kind: 'line',
    label: style.label,
    color: style.color,
    marker: style.marker,
    strokeWidth: 2,
    points: memory.points.map((p) => ({ x: p.seqLen, y: p[pick] })),
  });

  panel.series = [curve(MEMORY_STYLES.standard, 'standardMb'), curve(MEMORY_STYLES.flash, 'flashMb')];

  const last = memory.points[memory.points.length - 1];
  if (last) {
    panel.annotations = [
      { x: last.seqLen, y: last.standardMb, text: formatMegabytes(last.standardMb), offsetX: 0.7, offsetY: 1.5 },
      { x: last.seqLen, y: last.flashMb, text: formatMegabytes(last.flashMb), offsetX: 0.7, offsetY: 0.5 },
    ];
  }

  return { id: FIGURE_IDS.memory, ...config.memory, panels: [panel] };
}
