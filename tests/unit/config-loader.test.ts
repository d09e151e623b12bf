import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigLoader, ConfigResolver, loadConfig } from '../../cli/config/index.js';
import { createAnalyzerConfig } from '../../src/config/schema/index.js';
import { setLogLevel } from '../../src/debug/index.js';
import { ConfigError } from '../../src/errors/analyzer-error.js';

describe('cli/config', () => {
  let root: string;
  let builtinDir: string;
  let projectDir: string;
  let loader: ConfigLoader;
  let resolver: ConfigResolver;

  async function writePreset(dir: string, name: string, body: object): Promise<void> {
    await writeFile(join(dir, `${name}.json`), JSON.stringify(body), 'utf-8');
  }

  beforeEach(async () => {
    setLogLevel('silent');
    root = await mkdtemp(join(tmpdir(), 'attention-bench-config-'));
    builtinDir = join(root, 'builtin');
    projectDir = join(root, '.attention-bench');
    await mkdir(builtinDir);
    await mkdir(projectDir);
    resolver = new ConfigResolver({ projectRoot: root, builtinDir });
    loader = new ConfigLoader(resolver);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('ConfigLoader.load', () => {
    it('returns defaults when no reference is given', async () => {
      const loaded = await loader.load(null);
      expect(loaded.config).toEqual(createAnalyzerConfig());
      expect(loaded.chain).toEqual([]);
    });

    it('merges inline JSON over defaults', async () => {
      const loaded = await loader.load('{"analysis":{"slice":{"numHeads":16}}}');
      expect(loaded.config.analysis.slice).toEqual({ batchSize: 1, numHeads: 16, headDim: 64 });
      expect(loaded.config.report.title).toBe('Attention Benchmark Results');
    });

    it('resolves an extends chain across project and built-in presets', async () => {
      await writePreset(builtinDir, 'base', { analysis: { slice: { headDim: 128 } } });
      await writePreset(projectDir, 'child', { extends: 'base', analysis: { memory: { seqLens: [64, 128] } } });

      const loaded = await loader.load('child');
      expect(loaded.chain).toEqual(['base', 'child']);
      expect(loaded.config.analysis.slice.headDim).toBe(128);
      expect(loaded.config.analysis.memory.seqLens).toEqual([64, 128]);
      expect('extends' in loaded.raw).toBe(false);
    });

    it('loads a config file by path', async () => {
      await writeFile(join(root, 'custom.json'), JSON.stringify({ report: { title: 'Custom Run' } }), 'utf-8');
      const loaded = await loader.load('custom.json');
      expect(loaded.config.report.title).toBe('Custom Run');
    });

    it('applies overrides after the composed config', async () => {
      const loaded = await loader.load('{"analysis":{"slice":{"batchSize":2}}}', {
        overrides: { analysis: { slice: { batchSize: 4 } } },
      });
      expect(loaded.config.analysis.slice.batchSize).toBe(4);
    });

    it('detects circular extends', async () => {
      await writePreset(builtinDir, 'a', { extends: 'b' });
      await writePreset(builtinDir, 'b', { extends: 'a' });

      await expect(loader.load('a')).rejects.toThrow('Circular extends detected: a -> b -> a');
    });

    it('rejects an unknown preset', async () => {
      await expect(loader.load('missing')).rejects.toBeInstanceOf(ConfigError);
    });

    it('rejects invalid JSON', async () => {
      await expect(loader.load('{"analysis":')).rejects.toThrow('Invalid JSON in config "inline"');
    });

    it('rejects a non-positive slice coordinate', async () => {
      await expect(loader.load('{"analysis":{"slice":{"batchSize":0}}}')).rejects.toThrow(
        'analysis.slice.batchSize must be a positive integer, got 0'
      );
    });

    it('rejects a mistyped field', async () => {
      await expect(loader.load('{"analysis":{"memory":{"seqLens":"128"}}}')).rejects.toThrow(
        'analysis.memory.seqLens must be an array of numbers'
      );
    });

    it('rejects an empty memory projection', async () => {
      await expect(loader.load('{"analysis":{"memory":{"seqLens":[]}}}')).rejects.toThrow(
        'analysis.memory.seqLens must not be empty'
      );
    });

    it('rejects an unknown log level', async () => {
      await expect(loader.load('{"debug":{"logLevel":{"defaultLogLevel":"loud"}}}')).rejects.toThrow(
        'Invalid log level "loud"'
      );
    });
  });

  describe('ConfigResolver.listPresets', () => {
    it('lists presets with project presets shadowing built-ins', async () => {
      await writePreset(builtinDir, 'default', {});
      await writePreset(builtinDir, 'shared', {});
      await writePreset(projectDir, 'shared', {});

      const presets = await resolver.listPresets();
      expect(presets.map((p) => `${p.source}:${p.name}`)).toEqual(['project:shared', 'builtin:default']);
    });
  });

  describe('built-in presets', () => {
    it('extends default for long-context', async () => {
      const loaded = await loadConfig('long-context');
      expect(loaded.chain).toEqual(['default', 'long-context']);
      expect(loaded.config.analysis.memory.seqLens.at(-1)).toBe(32768);
    });

    it('keeps the slice and memory shape of wide-heads in step', async () => {
      const loaded = await loadConfig('wide-heads');
      expect(loaded.config.analysis.slice).toEqual({ batchSize: 1, numHeads: 16, headDim: 128 });
      expect(loaded.config.analysis.memory.shape).toEqual(loaded.config.analysis.slice);
    });
  });
});
