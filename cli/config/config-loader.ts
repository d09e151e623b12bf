/**
 * Config Loader
 *
 * Loads a composed config, applies CLI overrides, validates it and
 * converts it to AnalyzerConfigSchema. Main entry point for CLI config
 * handling.
 *
 * @module cli/config/config-loader
 */

import type { AnalyzerConfigOverrides, AnalyzerConfigSchema } from '../../src/config/schema/index.js';
import { createAnalyzerConfig } from '../../src/config/schema/index.js';
import { deepMerge, isPlainObject, type RawConfigObject } from '../../src/config/merge.js';
import { LOG_LEVEL_NAMES, log } from '../../src/debug/index.js';
import { ConfigError } from '../../src/errors/analyzer-error.js';
import { ConfigComposer } from './config-composer.js';
import { ConfigResolver, type PresetInfo } from './config-resolver.js';

// =============================================================================
// Types
// =============================================================================

export interface LoadedConfig {
  /** Validated config, merged with defaults */
  config: AnalyzerConfigSchema;
  /** Source chain (for debugging); empty when no config ref was given */
  chain: string[];
  /** Raw composed config, CLI overrides applied (before validation) */
  raw: RawConfigObject;
}

export interface LoadOptions {
  /** Raw overrides applied on top of the composed config (CLI flags) */
  overrides?: RawConfigObject;
}

const KNOWN_SECTIONS = ['analysis', 'report', 'debug'];

// =============================================================================
// Raw Readers
// =============================================================================

function readSection(raw: RawConfigObject, key: string, path: string): RawConfigObject | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config section "${path}" must be an object`);
  }
  return value;
}

function readNumber(raw: RawConfigObject | undefined, key: string, path: string): number | undefined {
  const value = raw?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`${path} must be a number`);
  }
  return value;
}

function readString(raw: RawConfigObject | undefined, key: string, path: string): string | undefined {
  const value = raw?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path} must be a string`);
  }
  return value;
}

function readNumberArray(raw: RawConfigObject | undefined, key: string, path: string): number[] | undefined {
  const value = raw?.[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigError(`${path} must be an array of numbers`);
  }
  return value.map((item) => {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      throw new ConfigError(`${path} must be an array of numbers`);
    }
    return item;
  });
}

function readStringArray(raw: RawConfigObject | undefined, key: string, path: string): string[] | undefined {
  const value = raw?.[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigError(`${path} must be an array of strings`);
  }
  return value.map((item) => {
    if (typeof item !== 'string') {
      throw new ConfigError(`${path} must be an array of strings`);
    }
    return item;
  });
}

function readShape(raw: RawConfigObject | undefined, path: string) {
  return {
    batchSize: readNumber(raw, 'batchSize', `${path}.batchSize`),
    numHeads: readNumber(raw, 'numHeads', `${path}.numHeads`),
    headDim: readNumber(raw, 'headDim', `${path}.headDim`),
  };
}

function readChartSize(raw: RawConfigObject | undefined, path: string) {
  return {
    width: readNumber(raw, 'width', `${path}.width`),
    height: readNumber(raw, 'height', `${path}.height`),
  };
}

/**
 * Drop undefined fields so spreads in createAnalyzerConfig keep defaults.
 */
function defined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

// =============================================================================
// Config Loader
// =============================================================================

export class ConfigLoader {
  private composer: ConfigComposer;
  private resolver: ConfigResolver;

  constructor(resolver?: ConfigResolver) {
    this.resolver = resolver ?? new ConfigResolver();
    this.composer = new ConfigComposer(this.resolver);
  }

  /**
   * Load and validate a config.
   *
   * @param ref - Config reference (name, path, or inline JSON); null for defaults only
   */
  async load(ref: string | null, options: LoadOptions = {}): Promise<LoadedConfig> {
    const composed = ref === null ? { config: {}, chain: [] } : await this.composer.compose(ref);
    const raw = options.overrides ? deepMerge(composed.config, options.overrides) : composed.config;

    const config = createAnalyzerConfig(this.toOverrides(raw));
    this.validate(config);

    return { config, chain: composed.chain, raw };
  }

  async listPresets(): Promise<PresetInfo[]> {
    return this.resolver.listPresets();
  }

  /**
   * Type-check a raw config object field by field.
   */
  private toOverrides(raw: RawConfigObject): AnalyzerConfigOverrides {
    for (const key of Object.keys(raw)) {
      if (!KNOWN_SECTIONS.includes(key)) {
        log.warn('Config', `Ignoring unknown config section "${key}"`);
      }
    }

    const analysis = readSection(raw, 'analysis', 'analysis');
    const memory = analysis ? readSection(analysis, 'memory', 'analysis.memory') : undefined;
    const report = readSection(raw, 'report', 'report');
    const debug = readSection(raw, 'debug', 'debug');
    const logLevel = debug ? readSection(debug, 'logLevel', 'debug.logLevel') : undefined;
    const logHistory = debug ? readSection(debug, 'logHistory', 'debug.logHistory') : undefined;
    const modules = debug ? readSection(debug, 'modules', 'debug.modules') : undefined;

    return {
      analysis: {
        slice: defined(readShape(analysis && readSection(analysis, 'slice', 'analysis.slice'), 'analysis.slice')),
        memory: defined({
          seqLens: readNumberArray(memory, 'seqLens', 'analysis.memory.seqLens'),
          shape: defined(readShape(memory && readSection(memory, 'shape', 'analysis.memory.shape'), 'analysis.memory.shape')),
          bytesPerElement: readNumber(memory, 'bytesPerElement', 'analysis.memory.bytesPerElement'),
        }),
      },
      report: defined({
        title: readString(report, 'title', 'report.title'),
        scaling: defined(readChartSize(report && readSection(report, 'scaling', 'report.scaling'), 'report.scaling')),
        speedup: defined(readChartSize(report && readSection(report, 'speedup', 'report.speedup'), 'report.speedup')),
        memory: defined(readChartSize(report && readSection(report, 'memory', 'report.memory'), 'report.memory')),
      }),
      debug: {
        logLevel: defined({ defaultLogLevel: readString(logLevel, 'defaultLogLevel', 'debug.logLevel.defaultLogLevel') }),
        logHistory: defined({
          maxLogHistoryEntries: readNumber(logHistory, 'maxLogHistoryEntries', 'debug.logHistory.maxLogHistoryEntries'),
        }),
        modules: defined({
          enabled: readStringArray(modules, 'enabled', 'debug.modules.enabled'),
          disabled: readStringArray(modules, 'disabled', 'debug.modules.disabled'),
        }),
      },
    };
  }

  /**
   * Validate value ranges of a merged config.
   * Throws ConfigError on the first invalid value.
   */
  private validate(config: AnalyzerConfigSchema): void {
    const { slice, memory } = config.analysis;

    requirePositiveInt(slice.batchSize, 'analysis.slice.batchSize');
    requirePositiveInt(slice.numHeads, 'analysis.slice.numHeads');
    requirePositiveInt(slice.headDim, 'analysis.slice.headDim');

    if (memory.seqLens.length === 0) {
      throw new ConfigError('analysis.memory.seqLens must not be empty');
    }
    memory.seqLens.forEach((seqLen, i) => requirePositiveInt(seqLen, `analysis.memory.seqLens[${i}]`));
    requirePositiveInt(memory.shape.batchSize, 'analysis.memory.shape.batchSize');
    requirePositiveInt(memory.shape.numHeads, 'analysis.memory.shape.numHeads');
    requirePositiveInt(memory.shape.headDim, 'analysis.memory.shape.headDim');
    requirePositiveInt(memory.bytesPerElement, 'analysis.memory.bytesPerElement');

    for (const chart of ['scaling', 'speedup', 'memory'] as const) {
      requirePositiveInt(config.report[chart].width, `report.${chart}.width`);
      requirePositiveInt(config.report[chart].height, `report.${chart}.height`);
    }

    const level = config.debug.logLevel.defaultLogLevel;
    if (!LOG_LEVEL_NAMES.some((name) => name === level)) {
      throw new ConfigError(`Invalid log level "${level}". Valid: ${LOG_LEVEL_NAMES.join(', ')}`);
    }

    const maxEntries = config.debug.logHistory.maxLogHistoryEntries;
    if (!Number.isInteger(maxEntries) || maxEntries < 0) {
      throw new ConfigError('debug.logHistory.maxLogHistoryEntries must be >= 0');
    }
  }
}

function requirePositiveInt(value: number, path: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${path} must be a positive integer, got ${value}`);
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

const defaultLoader = new ConfigLoader();

/**
 * Load a config by reference.
 */
export async function loadConfig(ref: string | null, options?: LoadOptions): Promise<LoadedConfig> {
  return defaultLoader.load(ref, options);
}

export async function listPresets(): Promise<PresetInfo[]> {
  return defaultLoader.listPresets();
}

/**
 * Dump a loaded config for debugging.
 */
export function dumpConfig(loaded: LoadedConfig): string {
  return JSON.stringify({ chain: loaded.chain, config: loaded.config }, null, 2);
}
