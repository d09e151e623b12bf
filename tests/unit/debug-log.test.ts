import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { resetRuntimeConfig, setRuntimeConfig } from '../../src/config/runtime.js';
import { createAnalyzerConfig } from '../../src/config/schema/index.js';
import {
  applyDebugConfig,
  clearLogHistory,
  disableModules,
  enableModules,
  getLogHistory,
  getLogLevel,
  log,
  perf,
  resetModuleFilters,
  setLogLevel,
} from '../../src/debug/index.js';

describe('debug/log', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    setLogLevel('warn');
    resetModuleFilters();
    clearLogHistory();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetModuleFilters();
    resetRuntimeConfig();
  });

  it('drops messages below the current level', () => {
    log.info('Records', 'parsed');
    log.warn('Records', 'skipped a row');
    log.error('Analyze', 'failed');

    expect(getLogHistory().map((e) => `${e.level} ${e.module} ${e.message}`)).toEqual([
      'WARN Records skipped a row',
      'ERROR Analyze failed',
    ]);
    expect(console.log).not.toHaveBeenCalled();
  });

  it('prefixes console output with the module tag', () => {
    log.warn('Records', 'skipped a row');
    const [line] = vi.mocked(console.warn).mock.calls[0] ?? [];
    expect(String(line)).toMatch(/^\[\d+\.\dms\]\[Records\] skipped a row$/);
  });

  it('always logs regardless of level', () => {
    setLogLevel('silent');
    log.always('CLI', 'done');
    expect(getLogHistory({ level: 'always' })).toHaveLength(1);
  });

  it('honours module filters case-insensitively', () => {
    disableModules('records');
    log.warn('Records', 'hidden');
    log.warn('Analyze', 'shown');
    expect(getLogHistory().map((e) => e.message)).toEqual(['shown']);

    resetModuleFilters();
    enableModules('Config');
    log.warn('Analyze', 'hidden');
    log.warn('Config', 'shown too');
    expect(getLogHistory({ last: 1 })[0]?.message).toBe('shown too');
  });

  it('caps history at the configured size', () => {
    setRuntimeConfig({ debug: { logHistory: { maxLogHistoryEntries: 2 } } });
    log.warn('A', '1');
    log.warn('A', '2');
    log.warn('A', '3');
    expect(getLogHistory().map((e) => e.message)).toEqual(['2', '3']);
  });

  it('applies level and module filters from config', () => {
    applyDebugConfig(
      createAnalyzerConfig({ debug: { logLevel: { defaultLogLevel: 'verbose' }, modules: { disabled: ['Perf'] } } }).debug
    );
    expect(getLogLevel()).toBe('verbose');

    log.verbose('Artifacts', 'wrote');
    log.warn('Perf', 'hidden');
    expect(getLogHistory().map((e) => e.message)).toEqual(['wrote']);
  });

  it('times a stage and logs at debug level', async () => {
    setLogLevel('debug');
    const { result } = await perf.time('load', async () => 42);
    expect(result).toBe(42);
    expect(getLogHistory({ module: 'Perf' })[0]?.message).toMatch(/^load: \d+\.\d{2}ms$/);
  });
});
