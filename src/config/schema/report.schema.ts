/**
 * Report Config Schema
 *
 * Chart canvas sizes and report title. Sizes are SVG user units.
 *
 * @module config/schema/report
 */

export interface ChartSizeSchema {
  width: number;
  height: number;
}

export interface ReportConfigSchema {
  /** Title line of REPORT.md */
  title: string;
  /** 3-panel scaling chart */
  scaling: ChartSizeSchema;
  /** Grouped-bar speedup chart */
  speedup: ChartSizeSchema;
  /** Standard vs flash memory chart */
  memory: ChartSizeSchema;
}

export const DEFAULT_REPORT_CONFIG: ReportConfigSchema = {
  title: 'Attention Benchmark Results',
  scaling: { width: 1500, height: 500 },
  speedup: { width: 1000, height: 600 },
  memory: { width: 1000, height: 600 },
};
