/**
 * SVG Renderer
 *
 * Renders a FigureSpec to a standalone SVG document. Output depends only on
 * the figure (no timestamps, no random ids), so re-rendering the same data
 * gives the same bytes.
 *
 * @module report/svg-renderer
 */

import type {
  AnnotationSpec,
  AxisScale,
  AxisSpec,
  BarSeriesSpec,
  FigureSpec,
  LineSeriesSpec,
  PanelSpec,
  ReferenceLineSpec,
} from './figure-types.js';

// ============================================================================
// Layout
// ============================================================================

const MARGIN = { top: 40, right: 20, bottom: 55, left: 75 };
const MARKER_SIZE = 3.5;
const LEGEND_ROW_HEIGHT = 16;
const BAR_GROUP_FILL = 0.7;
const MAX_LOG_TICKS = 12;

interface Tick {
  value: number;
  label: string;
  pos: number;
}

interface AxisMapping {
  map(value: number): number | null;
  ticks: Tick[];
  /** Category axes only: band centre positions */
  bands: number[];
  bandWidth: number;
}

// ============================================================================
// Formatting
// ============================================================================

/** Coordinate with at most two decimals, no trailing zeros */
function fmt(value: number): string {
  return String(Number(value.toFixed(2)));
}

export function formatTick(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(3)));
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// ============================================================================
// Scales
// ============================================================================

function logOf(value: number, base: number): number {
  return Math.log(value) / Math.log(base);
}

function niceStep(span: number): number {
  const raw = span / 5;
  const magnitude = 10 ** Math.floor(Math.log10(raw));
  for (const factor of [1, 2, 5, 10]) {
    if (factor * magnitude >= raw) return factor * magnitude;
  }
  return 10 * magnitude;
}

function linearMapping(values: number[], length: number, invert: boolean): AxisMapping {
  let lo = Math.min(0, ...values);
  let hi = values.length > 0 ? Math.max(...values) : 1;
  if (hi <= lo) hi = lo + 1;
  hi += (hi - lo) * 0.05;

  const step = niceStep(hi - lo);
  lo = Math.floor(lo / step) * step;

  const toPos = (value: number): number => {
    const t = (value - lo) / (hi - lo);
    return invert ? length * (1 - t) : length * t;
  };

  const ticks: Tick[] = [];
  for (let v = lo; v <= hi + step * 1e-9; v += step) {
    const value = Number(v.toPrecision(12));
    ticks.push({ value, label: formatTick(value), pos: toPos(value) });
  }

  return { map: toPos, ticks, bands: [], bandWidth: 0 };
}

function logMapping(values: number[], base: number, length: number, invert: boolean): AxisMapping {
  const positive = values.filter((v) => v > 0);
  let loExp = positive.length > 0 ? Math.floor(logOf(Math.min(...positive), base) + 1e-9) : 0;
  let hiExp = positive.length > 0 ? Math.ceil(logOf(Math.max(...positive), base) - 1e-9) : 1;
  if (hiExp <= loExp) {
    loExp -= 1;
    hiExp += 1;
  }

  const toPos = (value: number): number | null => {
    if (!(value > 0)) return null;
    const t = (logOf(value, base) - loExp) / (hiExp - loExp);
    return invert ? length * (1 - t) : length * t;
  };

  const stride = Math.max(1, Math.ceil((hiExp - loExp + 1) / MAX_LOG_TICKS));
  const ticks: Tick[] = [];
  for (let exp = loExp; exp <= hiExp; exp += stride) {
    const value = base ** exp;
    const pos = toPos(value);
    if (pos !== null) ticks.push({ value, label: formatTick(value), pos });
  }

  return { map: toPos, ticks, bands: [], bandWidth: 0 };
}

function categoryMapping(categories: string[], length: number): AxisMapping {
  const bandWidth = categories.length > 0 ? length / categories.length : length;
  const bands = categories.map((_, i) => (i + 0.5) * bandWidth);
  const ticks = categories.map((label, i) => ({ value: i, label, pos: bands[i] ?? 0 }));
  return {
    map: (index) => bands[index] ?? null,
    ticks,
    bands,
    bandWidth,
  };
}

function buildMapping(scale: AxisScale, values: number[], length: number, invert: boolean): AxisMapping {
  switch (scale.type) {
    case 'linear':
      return linearMapping(values, length, invert);
    case 'log':
      return logMapping(values, scale.base, length, invert);
    case 'category':
      return categoryMapping(scale.categories, length);
  }
}

function xValues(panel: PanelSpec): number[] {
  const values: number[] = [];
  for (const series of panel.series) {
    if (series.kind === 'line') values.push(...series.points.map((p) => p.x));
  }
  return values;
}

function yValues(panel: PanelSpec): number[] {
  const values: number[] = [];
  for (const series of panel.series) {
    if (series.kind === 'line') {
      values.push(...series.points.map((p) => p.y));
    } else {
      values.push(...series.values);
    }
  }
  values.push(...panel.referenceLines.map((line) => line.y));
  return values;
}

// ============================================================================
// Elements
// ============================================================================

function renderMarker(series: LineSeriesSpec, x: number, y: number): string {
  const s = MARKER_SIZE;
  switch (series.marker) {
    case 'circle':
      return `<circle cx="${fmt(x)}" cy="${fmt(y)}" r="${fmt(s)}" fill="${series.color}"/>`;
    case 'square':
      return `<rect x="${fmt(x - s)}" y="${fmt(y - s)}" width="${fmt(2 * s)}" height="${fmt(2 * s)}" fill="${series.color}"/>`;
    case 'diamond':
      return `<polygon points="${fmt(x)},${fmt(y - s - 1)} ${fmt(x + s + 1)},${fmt(y)} ${fmt(x)},${fmt(y + s + 1)} ${fmt(x - s - 1)},${fmt(y)}" fill="${series.color}"/>`;
  }
}

function renderLine(series: LineSeriesSpec, xMap: AxisMapping, yMap: AxisMapping): string {
  const coords: Array<[number, number]> = [];
  for (const point of series.points) {
    const x = xMap.map(point.x);
    const y = yMap.map(point.y);
    if (x !== null && y !== null) coords.push([x, y]);
  }

  const parts = [`<g class="series line" data-label="${escapeXml(series.label)}">`];
  if (coords.length > 1) {
    const points = coords.map(([x, y]) => `${fmt(x)},${fmt(y)}`).join(' ');
    parts.push(
      `<polyline points="${points}" fill="none" stroke="${series.color}" stroke-width="${fmt(series.strokeWidth)}"/>`
    );
  }
  for (const [x, y] of coords) {
    parts.push(renderMarker(series, x, y));
  }
  parts.push('</g>');
  return parts.join('');
}

function renderBars(bars: BarSeriesSpec[], xMap: AxisMapping, yMap: AxisMapping): string {
  if (bars.length === 0) return '';
  const groupWidth = xMap.bandWidth * BAR_GROUP_FILL;
  const barWidth = groupWidth / bars.length;
  const base = yMap.map(0) ?? 0;

  return bars
    .map((series, j) => {
      const rects = series.values.map((value, i) => {
        const centre = xMap.bands[i] ?? 0;
        const top = yMap.map(value) ?? base;
        const x = centre - groupWidth / 2 + j * barWidth;
        return `<rect class="bar" data-category="${i}" x="${fmt(x)}" y="${fmt(Math.min(top, base))}" width="${fmt(barWidth)}" height="${fmt(Math.abs(base - top))}" fill="${series.color}"/>`;
      });
      return `<g class="series bar" data-label="${escapeXml(series.label)}">${rects.join('')}</g>`;
    })
    .join('');
}

function renderReferenceLine(line: ReferenceLineSpec, yMap: AxisMapping, plotWidth: number): string {
  const y = yMap.map(line.y);
  if (y === null) return '';
  const dash = line.dashed ? ' stroke-dasharray="6,4"' : '';
  return `<line class="reference" x1="0" y1="${fmt(y)}" x2="${fmt(plotWidth)}" y2="${fmt(y)}" stroke="${line.color}" stroke-opacity="${fmt(line.opacity)}"${dash}/>`;
}

function renderAnnotation(annotation: AnnotationSpec, x: AxisSpec, xMap: AxisMapping, yMap: AxisMapping): string {
  const scaled = (value: number, factor: number, scale: AxisScale): number =>
    scale.type === 'log' ? value * factor : value;
  const tx = xMap.map(scaled(annotation.x, annotation.offsetX, x.scale));
  const ty = yMap.map(annotation.y * annotation.offsetY);
  if (tx === null || ty === null) return '';
  return `<text class="annotation" x="${fmt(tx)}" y="${fmt(ty)}">${escapeXml(annotation.text)}</text>`;
}

function renderGrid(panel: PanelSpec, xMap: AxisMapping, yMap: AxisMapping, width: number, height: number): string {
  if (panel.gridOpacity <= 0) return '';
  const lines: string[] = [];
  if (panel.gridAxis === 'both' && panel.x.scale.type !== 'category') {
    for (const tick of xMap.ticks) {
      lines.push(`<line x1="${fmt(tick.pos)}" y1="0" x2="${fmt(tick.pos)}" y2="${fmt(height)}"/>`);
    }
  }
  for (const tick of yMap.ticks) {
    lines.push(`<line x1="0" y1="${fmt(tick.pos)}" x2="${fmt(width)}" y2="${fmt(tick.pos)}"/>`);
  }
  return `<g class="grid" stroke="#b0b0b0" stroke-opacity="${fmt(panel.gridOpacity)}">${lines.join('')}</g>`;
}

function renderAxes(panel: PanelSpec, xMap: AxisMapping, yMap: AxisMapping, width: number, height: number): string {
  const parts = ['<g class="axes" stroke="black">'];
  parts.push(`<line x1="0" y1="${fmt(height)}" x2="${fmt(width)}" y2="${fmt(height)}"/>`);
  parts.push(`<line x1="0" y1="0" x2="0" y2="${fmt(height)}"/>`);
  parts.push('</g>');

  parts.push('<g class="ticks" text-anchor="middle">');
  for (const tick of xMap.ticks) {
    parts.push(`<text x="${fmt(tick.pos)}" y="${fmt(height + 16)}">${escapeXml(tick.label)}</text>`);
  }
  parts.push('</g><g class="ticks" text-anchor="end">');
  for (const tick of yMap.ticks) {
    parts.push(`<text x="-6" y="${fmt(tick.pos + 4)}">${escapeXml(tick.label)}</text>`);
  }
  parts.push('</g>');

  parts.push(
    `<text class="axis-label" x="${fmt(width / 2)}" y="${fmt(height + 40)}" text-anchor="middle">${escapeXml(panel.x.label)}</text>`
  );
  parts.push(
    `<text class="axis-label" transform="translate(-55,${fmt(height / 2)}) rotate(-90)" text-anchor="middle">${escapeXml(panel.y.label)}</text>`
  );
  return parts.join('');
}

function renderLegend(panel: PanelSpec): string {
  if (panel.series.length === 0) return '';
  const rows = panel.series.map((series, i) => {
    const y = 10 + i * LEGEND_ROW_HEIGHT;
    return `<rect x="8" y="${fmt(y - 8)}" width="14" height="8" fill="${series.color}"/><text x="28" y="${fmt(y)}">${escapeXml(series.label)}</text>`;
  });
  return `<g class="legend">${rows.join('')}</g>`;
}

function renderPanel(panel: PanelSpec, offsetX: number, panelWidth: number, height: number): string {
  const plotWidth = Math.max(1, panelWidth - MARGIN.left - MARGIN.right);
  const plotHeight = Math.max(1, height - MARGIN.top - MARGIN.bottom);

  const xMap = buildMapping(panel.x.scale, xValues(panel), plotWidth, false);
  const yMap = buildMapping(panel.y.scale, yValues(panel), plotHeight, true);

  const bars = panel.series.filter((s): s is BarSeriesSpec => s.kind === 'bar');
  const lines = panel.series.filter((s): s is LineSeriesSpec => s.kind === 'line');

  return [
    `<g class="panel" transform="translate(${fmt(offsetX)},0)">`,
    `<text class="title" x="${fmt(panelWidth / 2)}" y="22" text-anchor="middle" font-size="14">${escapeXml(panel.title)}</text>`,
    `<g transform="translate(${MARGIN.left},${MARGIN.top})">`,
    renderGrid(panel, xMap, yMap, plotWidth, plotHeight),
    renderBars(bars, xMap, yMap),
    ...lines.map((series) => renderLine(series, xMap, yMap)),
    ...panel.referenceLines.map((line) => renderReferenceLine(line, yMap, plotWidth)),
    ...panel.annotations.map((annotation) => renderAnnotation(annotation, panel.x, xMap, yMap)),
    renderAxes(panel, xMap, yMap, plotWidth, plotHeight),
    renderLegend(panel),
    '</g></g>',
  ].join('');
}

// ============================================================================
// Public API
// ============================================================================

export function renderFigure(figure: FigureSpec): string {
  const panelWidth = figure.panels.length > 0 ? figure.width / figure.panels.length : figure.width;
  const panels = figure.panels.map((panel, i) => renderPanel(panel, i * panelWidth, panelWidth, figure.height));

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${figure.width}" height="${figure.height}" viewBox="0 0 ${figure.width} ${figure.height}" font-family="sans-serif" font-size="12">`,
    `<rect width="${figure.width}" height="${figure.height}" fill="white"/>`,
    ...panels,
    '</svg>',
    '',
  ].join('\n');
}
