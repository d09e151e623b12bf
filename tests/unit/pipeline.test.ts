import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createAnalyzerConfig } from '../../src/config/schema/index.js';
import { clearLogHistory, getLogHistory, setLogLevel } from '../../src/debug/index.js';
import { AnalyzerError, ERROR_CODES } from '../../src/errors/analyzer-error.js';
import { runAnalysis } from '../../src/pipeline/index.js';
import { CSV_HEADER, SWEEP_CSV } from './fixtures.js';

const ARTIFACTS = ['REPORT.md', 'memory_scaling.svg', 'scaling_analysis.svg', 'speedup_comparison.svg', 'summary.json'];

describe('pipeline/analyze', () => {
  let dir: string;
  let csvPath: string;

  beforeEach(async () => {
    setLogLevel('silent');
    clearLogHistory();
    dir = await mkdtemp(join(tmpdir(), 'attention-bench-pipeline-'));
    csvPath = join(dir, 'results.csv');
    await writeFile(csvPath, SWEEP_CSV, 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes all five artifacts into a new nested directory', async () => {
    const outputDir = join(dir, 'out', 'nested');
    const result = await runAnalysis({ csvPath, outputDir, config: createAnalyzerConfig() });

    expect(result.outputDir).toBe(outputDir);
    expect(result.recordCount).toBe(10);
    expect(result.skippedRows).toBe(0);
    expect(result.artifacts.map((p) => p.slice(outputDir.length + 1))).toEqual([
      'scaling_analysis.svg',
      'speedup_comparison.svg',
      'memory_scaling.svg',
      'summary.json',
      'REPORT.md',
    ]);
    expect((await readdir(outputDir)).sort()).toEqual(ARTIFACTS);
  });

  it('draws three bar pairs and projects flash below standard', async () => {
    const outputDir = join(dir, 'out');
    const result = await runAnalysis({ csvPath, outputDir, config: createAnalyzerConfig() });

    const speedupSvg = await readFile(join(outputDir, 'speedup_comparison.svg'), 'utf-8');
    expect(speedupSvg.split('class="bar"').length - 1).toBe(6);
    expect(result.speedup.rows.map((r) => r.seqLen)).toEqual([128, 256, 512]);
    expect(result.memory.points.every((p) => p.flashMb < p.standardMb)).toBe(true);

    const summary: unknown = JSON.parse(await readFile(join(outputDir, 'summary.json'), 'utf-8'));
    expect(summary).toEqual(result.summary);

    const report = await readFile(join(outputDir, 'REPORT.md'), 'utf-8');
    expect(report.split('\n').slice(0, 3)).toEqual(['# Attention Benchmark Results', '', 'Total configurations tested: 10']);
  });

  it('writes byte-identical artifacts when run twice into the same directory', async () => {
    const config = createAnalyzerConfig();
    const outputDir = join(dir, 'out');
    const names = ['summary.json', 'speedup_comparison.svg', 'REPORT.md'];

    await runAnalysis({ csvPath, outputDir, config });
    const first = await Promise.all(names.map((name) => readFile(join(outputDir, name))));

    await runAnalysis({ csvPath, outputDir, config });
    const second = await Promise.all(names.map((name) => readFile(join(outputDir, name))));

    names.forEach((_, i) => {
      expect(first[i]?.equals(second[i] ?? Buffer.alloc(0))).toBe(true);
    });
    expect((await readdir(outputDir)).sort()).toEqual(ARTIFACTS);
  });

  it('honours the configured slice', async () => {
    const config = createAnalyzerConfig({ analysis: { slice: { batchSize: 2 } } });
    const result = await runAnalysis({ csvPath, outputDir: join(dir, 'out'), config });

    expect(result.scaling.latency.naive.points).toEqual([{ seqLen: 128, value: 9 }]);
    expect(result.speedup.rows).toEqual([{ seqLen: 128, shared: 0, flash: 0 }]);
    expect(result.gaps.map((g) => g.attentionType)).toEqual(['shared', 'flash']);
  });

  it('logs empty-slice warnings without failing', async () => {
    setLogLevel('warn');
    const config = createAnalyzerConfig({ analysis: { slice: { numHeads: 32 } } });
    await runAnalysis({ csvPath, outputDir: join(dir, 'out'), config });

    expect(getLogHistory({ module: 'Analyze', level: 'warn' }).map((e) => e.message)).toEqual([
      'No naive records for slice batch=1, heads=32, dim=64',
      'No shared records for slice batch=1, heads=32, dim=64',
      'No flash records for slice batch=1, heads=32, dim=64',
    ]);
  });

  it('counts rows skipped as unmeasured', async () => {
    setLogLevel('silent');
    await writeFile(csvPath, [CSV_HEADER, 'naive,1,8,128,64,1.0,0.1,10', 'flash,1,8,128,64,N/A,N/A,N/A'].join('\n'));
    const result = await runAnalysis({ csvPath, outputDir: join(dir, 'out'), config: createAnalyzerConfig() });

    expect(result.recordCount).toBe(1);
    expect(result.skippedRows).toBe(1);
    expect(result.summary.configurations_tested).toBe(1);
  });

  it('fails before writing anything when the input cannot be read', async () => {
    const outputDir = join(dir, 'out');
    const run = runAnalysis({ csvPath: join(dir, 'absent.csv'), outputDir, config: createAnalyzerConfig() });

    await expect(run).rejects.toBeInstanceOf(AnalyzerError);
    await expect(run).rejects.toMatchObject({ code: ERROR_CODES.INPUT_UNREADABLE });
    expect(await readdir(outputDir)).toEqual([]);
  });

  it('fails before writing anything on a malformed table', async () => {
    await writeFile(csvPath, [CSV_HEADER, 'naive,1,8,128,64,fast,0.1,10'].join('\n'));
    const outputDir = join(dir, 'out');

    await expect(runAnalysis({ csvPath, outputDir, config: createAnalyzerConfig() })).rejects.toMatchObject({
      code: ERROR_CODES.INPUT_MALFORMED,
      row: 2,
      column: 'time_ms',
    });
    expect(await readdir(outputDir)).toEqual([]);
  });
});
