import { mkdtemp, readdir, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { computeScaling, computeSpeedup, projectMemory, type Summary } from '../../src/analysis/index.js';
import {
  DEFAULT_ANALYSIS_SLICE,
  DEFAULT_MEMORY_PROJECTION_CONFIG,
  DEFAULT_REPORT_CONFIG,
} from '../../src/config/schema/index.js';
import { setLogLevel } from '../../src/debug/index.js';
import { ArtifactWriteError } from '../../src/errors/analyzer-error.js';
import { parseRecords } from '../../src/records/index.js';
import {
  buildMemoryFigure,
  buildScalingFigure,
  buildSpeedupFigure,
  escapeXml,
  formatMegabytes,
  formatReport,
  formatSummaryJson,
  formatTick,
  renderFigure,
  writeArtifacts,
  type BarSeriesSpec,
} from '../../src/report/index.js';
import { SWEEP_CSV } from './fixtures.js';

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

const store = parseRecords(SWEEP_CSV);

describe('report/figures', () => {
  it('builds a three-panel scaling figure', () => {
    const figure = buildScalingFigure(computeScaling(store, DEFAULT_ANALYSIS_SLICE), DEFAULT_REPORT_CONFIG);

    expect(figure.id).toBe('scaling_analysis');
    expect(figure.width).toBe(1500);
    expect(figure.height).toBe(500);
    expect(figure.panels.map((p) => p.title)).toEqual(['Latency Scaling', 'Throughput Scaling', 'Memory Bandwidth']);
    expect(figure.panels.map((p) => p.x.scale)).toEqual([
      { type: 'log', base: 2 },
      { type: 'log', base: 2 },
      { type: 'log', base: 2 },
    ]);
    expect(figure.panels[0]?.y.scale).toEqual({ type: 'log', base: 10 });
    expect(figure.panels[1]?.y.scale).toEqual({ type: 'linear' });
    expect(figure.panels[0]?.series.map((s) => s.label)).toEqual(['Naive', 'Shared Memory', 'Flash Attention']);
  });

  it('builds grouped speedup bars with a break-even line', () => {
    const figure = buildSpeedupFigure(computeSpeedup(store, DEFAULT_ANALYSIS_SLICE), DEFAULT_REPORT_CONFIG);
    const panel = figure.panels[0];

    expect(panel?.x.scale).toEqual({ type: 'category', categories: ['128', '256', '512'] });
    const bars = panel?.series.filter((s): s is BarSeriesSpec => s.kind === 'bar') ?? [];
    expect(bars.map((b) => [b.label, b.color, b.values])).toEqual([
      ['Shared Memory', 'steelblue', [2, 2, 4]],
      ['Flash Attention', 'coral', [4, 4, 8]],
    ]);
    expect(panel?.referenceLines).toEqual([{ y: 1, color: 'gray', dashed: true, opacity: 0.5 }]);
  });

  it('annotates the last memory point in MB', () => {
    const { seqLens, shape } = DEFAULT_MEMORY_PROJECTION_CONFIG;
    const figure = buildMemoryFigure(projectMemory(seqLens, shape), DEFAULT_REPORT_CONFIG);
    const panel = figure.panels[0];

    expect(panel?.series.map((s) => [s.label, s.color])).toEqual([
      ['Standard (theoretical)', 'red'],
      ['Flash (theoretical)', 'green'],
    ]);
    expect(panel?.annotations.map((a) => a.text)).toEqual(['2112 MB', '64 MB']);
    expect(panel?.annotations[0]).toMatchObject({ x: 8192, y: 2112, offsetX: 0.7, offsetY: 1.5 });
  });

  it('never reuses a variant label with a different colour', () => {
    const { seqLens, shape } = DEFAULT_MEMORY_PROJECTION_CONFIG;
    const figures = [
      buildScalingFigure(computeScaling(store, DEFAULT_ANALYSIS_SLICE), DEFAULT_REPORT_CONFIG),
      buildSpeedupFigure(computeSpeedup(store, DEFAULT_ANALYSIS_SLICE), DEFAULT_REPORT_CONFIG),
      buildMemoryFigure(projectMemory(seqLens, shape), DEFAULT_REPORT_CONFIG),
    ];
    const colors = new Map<string, Set<string>>();
    for (const series of figures.flatMap((f) => f.panels.flatMap((p) => p.series))) {
      const seen = colors.get(series.label) ?? new Set<string>();
      seen.add(series.color);
      colors.set(series.label, seen);
    }
    for (const [, seen] of colors) {
      expect(seen.size).toBe(1);
    }
    expect(colors.get('Flash Attention')).toEqual(new Set(['coral']));
  });

  it('rounds megabytes to whole numbers', () => {
    expect(formatMegabytes(1.5)).toBe('2 MB');
    expect(formatMegabytes(2112)).toBe('2112 MB');
  });
});

describe('report/svg-renderer', () => {
  const speedupFigure = buildSpeedupFigure(computeSpeedup(store, DEFAULT_ANALYSIS_SLICE), DEFAULT_REPORT_CONFIG);

  it('draws one bar per variant per seqLen', () => {
    const svg = renderFigure(speedupFigure);
    expect(countOccurrences(svg, 'class="bar"')).toBe(6);
    expect(countOccurrences(svg, 'data-category="2"')).toBe(2);
    expect(countOccurrences(svg, 'class="reference"')).toBe(1);
  });

  it('produces a standalone SVG document', () => {
    const svg = renderFigure(speedupFigure);
    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="1000" height="600"')).toBe(true);
    expect(svg.endsWith('</svg>\n')).toBe(true);
  });

  it('renders the same bytes for the same figure', () => {
    expect(renderFigure(speedupFigure)).toBe(renderFigure(speedupFigure));
  });

  it('renders memory annotations as text', () => {
    const { seqLens, shape } = DEFAULT_MEMORY_PROJECTION_CONFIG;
    const svg = renderFigure(buildMemoryFigure(projectMemory(seqLens, shape), DEFAULT_REPORT_CONFIG));
    expect(svg).toContain('>2112 MB</text>');
    expect(svg).toContain('>64 MB</text>');
  });

  it('renders empty series without a polyline', () => {
    const naiveOnly = store.where({ attentionType: 'naive' });
    const figure = buildScalingFigure(computeScaling(naiveOnly, DEFAULT_ANALYSIS_SLICE), DEFAULT_REPORT_CONFIG);
    const svg = renderFigure(figure);
    expect(countOccurrences(svg, '<polyline')).toBe(3);
    expect(countOccurrences(svg, 'data-label="Flash Attention"')).toBe(3);
  });

  it('escapes XML text', () => {
    expect(escapeXml(`a<b & "c" 'd'>`)).toBe('a&lt;b &amp; &quot;c&quot; &apos;d&apos;&gt;');
  });

  it('formats ticks', () => {
    expect(formatTick(1024)).toBe('1024');
    expect(formatTick(0.5)).toBe('0.5');
    expect(formatTick(0.1234)).toBe('0.123');
  });
});

describe('report/summary-report', () => {
  const summary: Summary = {
    configurations_tested: 3,
    implementations: ['naive', 'flash'],
    best_performance: {
      naive: { max_tflops: 1.5, max_bandwidth_gbps: 200, min_latency_ms: 0.25 },
      flash: { max_tflops: 2.25, max_bandwidth_gbps: 350.5, min_latency_ms: 0.125 },
    },
  };

  it('writes summary.json with two-space indent and a trailing newline', () => {
    const json = formatSummaryJson(summary);
    expect(json.startsWith('{\n  "configurations_tested": 3,\n  "implementations": [\n    "naive",')).toBe(true);
    expect(json.endsWith('}\n')).toBe(true);
    expect(JSON.parse(json)).toEqual(summary);
  });

  it('writes the report sections in order', () => {
    expect(formatReport(summary, DEFAULT_REPORT_CONFIG)).toBe(
      [
        '# Attention Benchmark Results',
        '',
        'Total configurations tested: 3',
        '',
        '## Best Performance by Implementation',
        '',
        '### Naive',
        '- Max TFLOPS: 1.500',
        '- Max Bandwidth: 200.00 GB/s',
        '- Min Latency: 0.250 ms',
        '',
        '### Flash',
        '- Max TFLOPS: 2.250',
        '- Max Bandwidth: 350.50 GB/s',
        '- Min Latency: 0.125 ms',
        '',
        '## Key Insights',
        '',
        '1. **Flash Attention** shows superior memory efficiency at long sequences',
        '2. **Shared Memory** optimization provides consistent speedup over naive',
        '3. Scaling is O(N²) for standard attention, O(N) for Flash Attention',
        '',
      ].join('\n')
    );
  });

  it('uses the configured title', () => {
    expect(formatReport(summary, { title: 'Nightly Sweep' }).split('\n')[0]).toBe('# Nightly Sweep');
  });
});

describe('report/artifacts', () => {
  let dir: string;

  beforeEach(async () => {
    setLogLevel('silent');
    dir = await mkdtemp(join(tmpdir(), 'attention-bench-artifacts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes every artifact and leaves no temp files', async () => {
    const paths = await writeArtifacts(dir, [
      { name: 'a.txt', content: 'alpha\n' },
      { name: 'b.txt', content: 'beta\n' },
    ]);

    expect(paths).toEqual([join(dir, 'a.txt'), join(dir, 'b.txt')]);
    expect((await readdir(dir)).sort()).toEqual(['a.txt', 'b.txt']);
    expect(await readFile(join(dir, 'b.txt'), 'utf-8')).toBe('beta\n');
  });

  it('replaces an existing artifact', async () => {
    await writeArtifacts(dir, [{ name: 'a.txt', content: 'old' }]);
    await writeArtifacts(dir, [{ name: 'a.txt', content: 'new' }]);
    expect(await readFile(join(dir, 'a.txt'), 'utf-8')).toBe('new');
  });

  it('wraps write failures with the target path', async () => {
    const missing = join(dir, 'missing');
    await expect(writeArtifacts(missing, [{ name: 'a.txt', content: 'x' }])).rejects.toBeInstanceOf(ArtifactWriteError);
    await expect(writeArtifacts(missing, [{ name: 'a.txt', content: 'x' }])).rejects.toMatchObject({
      path: join(missing, 'a.txt'),
      code: 'ANALYZER_ARTIFACT_WRITE_FAILED',
    });
  });
});
