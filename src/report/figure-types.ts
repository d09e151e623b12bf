/**
 * Figure Descriptions
 *
 * Renderer-independent description of a chart: panels, axes, series,
 * reference lines and annotations. Figures are built from projections and
 * handed to a renderer; nothing here knows about pixels.
 *
 * @module report/figure-types
 */

export type AxisScale =
  | { type: 'linear' }
  | { type: 'log'; base: number }
  | { type: 'category'; categories: string[] };

export interface AxisSpec {
  label: string;
  scale: AxisScale;
}

export interface DataPoint {
  x: number;
  y: number;
}

export interface LineSeriesSpec {
  kind: 'line';
  label: string;
  color: string;
  marker: 'circle' | 'square' | 'diamond';
  strokeWidth: number;
  points: DataPoint[];
}

/**
 * One bar per category; `values[i]` belongs to `categories[i]` of the
 * panel's category axis.
 */
export interface BarSeriesSpec {
  kind: 'bar';
  label: string;
  color: string;
  values: number[];
}

export type SeriesSpec = LineSeriesSpec | BarSeriesSpec;

export interface ReferenceLineSpec {
  /** Horizontal line at this y value */
  y: number;
  color: string;
  dashed: boolean;
  opacity: number;
}

/**
 * Text attached to a data point. The label is drawn at
 * (x * offsetX, y * offsetY), so offsets are scale-relative factors.
 */
export interface AnnotationSpec {
  x: number;
  y: number;
  text: string;
  offsetX: number;
  offsetY: number;
}

export interface PanelSpec {
  title: string;
  x: AxisSpec;
  y: AxisSpec;
  series: SeriesSpec[];
  referenceLines: ReferenceLineSpec[];
  annotations: AnnotationSpec[];
  /** Grid line opacity; 0 disables the grid */
  gridOpacity: number;
  /** Draw only horizontal grid lines */
  gridAxis: 'both' | 'y';
}

export interface FigureSpec {
  /** Artifact base name, e.g. "scaling_analysis" */
  id: string;
  width: number;
  height: number;
  /** Panels are laid out left to right with equal width */
  panels: PanelSpec[];
}
