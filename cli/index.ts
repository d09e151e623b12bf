#!/usr/bin/env node
/**
 * Attention Benchmark Analyzer CLI
 *
 * Usage:
 *   npx tsx cli/index.ts --csv results/benchmark.csv            # Write to ./analysis
 *   npx tsx cli/index.ts analyze --csv results.csv -o out        # Explicit command
 *   npx tsx cli/index.ts --csv results.csv --config long-context # Use a preset
 */

import { realpathSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

import type { RawConfigObject } from '../src/config/merge.js';
import { setRuntimeConfig } from '../src/config/runtime.js';
import { applyDebugConfig, isLogLevelName, log, setLogLevel } from '../src/debug/index.js';
import { describeError, isAnalyzerError } from '../src/errors/analyzer-error.js';
import { runAnalysis } from '../src/pipeline/index.js';
import { dumpConfig, listPresets, loadConfig } from './config/index.js';
import { CLIUsageError, EXIT_CODES, type CLIOptions } from './helpers/types.js';

const DEFAULT_OUTPUT_DIR = 'analysis';

// ============================================================================
// Argument Parsing
// ============================================================================

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('-')) {
    throw new CLIUsageError(`${flag} requires a value`);
  }
  return value;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CLIUsageError(`${flag} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

function parseIntList(flag: string, value: string | undefined): number[] {
  const raw = requireValue(flag, value);
  return raw.split(',').map((part) => parsePositiveInt(flag, part.trim()));
}

export function parseArgs(argv: string[]): CLIOptions {
  const opts: CLIOptions = {
    command: 'analyze',
    csv: null,
    output: DEFAULT_OUTPUT_DIR,
    config: null,
    batchSize: null,
    numHeads: null,
    headDim: null,
    seqLens: null,
    logLevel: null,
    verbose: false,
    quiet: false,
    dumpConfig: false,
    listPresets: false,
    help: false,
  };

  const tokens = [...argv];
  let positionalIndex = 0;

  for (let arg = tokens.shift(); arg !== undefined; arg = tokens.shift()) {
    switch (arg) {
      case '--help':
      case '-h':
        opts.help = true;
        break;
      case '--csv':
        opts.csv = requireValue(arg, tokens.shift());
        break;
      case '--output':
      case '-o':
        opts.output = requireValue(arg, tokens.shift());
        break;
      case '--config':
      case '-c':
        opts.config = requireValue(arg, tokens.shift());
        break;
      case '--batch':
        opts.batchSize = parsePositiveInt(arg, tokens.shift());
        break;
      case '--heads':
        opts.numHeads = parsePositiveInt(arg, tokens.shift());
        break;
      case '--head-dim':
        opts.headDim = parsePositiveInt(arg, tokens.shift());
        break;
      case '--seq-lens':
        opts.seqLens = parseIntList(arg, tokens.shift());
        break;
      case '--log-level': {
        const level = requireValue(arg, tokens.shift());
        if (!isLogLevelName(level)) {
          throw new CLIUsageError(`Unknown log level "${level}"`);
        }
        opts.logLevel = level;
        break;
      }
      case '--verbose':
      case '-v':
        opts.verbose = true;
        break;
      case '--quiet':
      case '-q':
        opts.quiet = true;
        break;
      case '--dump-config':
        opts.dumpConfig = true;
        break;
      case '--list-presets':
        opts.listPresets = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new CLIUsageError(`Unknown option ${arg}`);
        }
        if (positionalIndex === 0 && arg === 'analyze') {
          opts.command = 'analyze';
        } else {
          throw new CLIUsageError(`Unexpected argument "${arg}"`);
        }
        positionalIndex++;
        break;
    }
  }

  return opts;
}

/**
 * Config overrides carried by flags, in raw config form.
 */
export function buildConfigOverrides(opts: CLIOptions): RawConfigObject {
  const slice: RawConfigObject = {};
  if (opts.batchSize !== null) slice.batchSize = opts.batchSize;
  if (opts.numHeads !== null) slice.numHeads = opts.numHeads;
  if (opts.headDim !== null) slice.headDim = opts.headDim;

  const analysis: RawConfigObject = { slice };
  if (opts.seqLens !== null) analysis.memory = { seqLens: opts.seqLens };

  return { analysis };
}

function resolveLogLevel(opts: CLIOptions): string | null {
  if (opts.logLevel) return opts.logLevel;
  if (opts.verbose) return 'verbose';
  if (opts.quiet) return 'warn';
  return null;
}

export function printHelp(): void {
  console.log(`
Attention Benchmark Analyzer

Usage:
  attention-bench [analyze] --csv <path> [options]

Required:
  --csv <path>             Benchmark results CSV

Options:
  --output, -o <dir>       Output directory (default: ${DEFAULT_OUTPUT_DIR})
  --config, -c <ref>       Config preset name, JSON file, or inline JSON
  --batch <n>              Analysis slice batch size (default: 1)
  --heads <n>              Analysis slice head count (default: 8)
  --head-dim <n>           Analysis slice head dimension (default: 64)
  --seq-lens <a,b,...>     Sequence lengths for the memory projection
  --log-level <level>      debug | verbose | info | warn | error | silent
  --verbose, -v            Verbose logging
  --quiet, -q              Warnings and errors only
  --dump-config            Print the resolved config and exit
  --list-presets           List available config presets and exit
  --help, -h               Show this help

Artifacts:
  scaling_analysis.svg  speedup_comparison.svg  memory_scaling.svg
  summary.json  REPORT.md
`);
}

// ============================================================================
// Main
// ============================================================================

export async function main(argv: string[]): Promise<number> {
  let opts: CLIOptions;
  try {
    opts = parseArgs(argv);
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    console.error('Run with --help for usage.');
    return EXIT_CODES.USAGE;
  }

  if (opts.help) {
    printHelp();
    return EXIT_CODES.OK;
  }

  try {
    if (opts.listPresets) {
      console.log('\nAvailable Config Presets:\n');
      for (const preset of await listPresets()) {
        console.log(`  ${preset.name.padEnd(15)} ${preset.source.padEnd(8)} ${preset.path}`);
      }
      console.log('');
      return EXIT_CODES.OK;
    }

    const loaded = await loadConfig(opts.config, { overrides: buildConfigOverrides(opts) });
    setRuntimeConfig(loaded.config);
    applyDebugConfig(loaded.config.debug);
    const level = resolveLogLevel(opts);
    if (level) setLogLevel(level);

    if (loaded.chain.length > 0) {
      log.verbose('CLI', `Config loaded: ${loaded.chain.join(' -> ')}`);
    }

    if (opts.dumpConfig) {
      console.log(dumpConfig(loaded));
      return EXIT_CODES.OK;
    }

    if (!opts.csv) {
      console.error('Error: --csv <path> is required');
      console.error('Run with --help for usage.');
      return EXIT_CODES.USAGE;
    }

    await runAnalysis({ csvPath: opts.csv, outputDir: opts.output, config: loaded.config });
    return EXIT_CODES.OK;
  } catch (err) {
    // Not through log: fatal errors print whatever the level and module filters say
    if (isAnalyzerError(err)) {
      console.error(`Error: ${err.code}: ${err.message}`);
    } else {
      console.error(`Error: ${describeError(err)}`);
    }
    return EXIT_CODES.FAILURE;
  }
}

function canonicalPath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return resolve(path);
  }
}

/**
 * True when `entry` (argv[1]) is this module. npm links `bin` entries, so
 * both sides are compared after resolving symlinks.
 */
export function isEntryPoint(entry: string | undefined, moduleUrl: string = import.meta.url): boolean {
  if (entry === undefined) return false;
  return canonicalPath(entry) === canonicalPath(fileURLToPath(moduleUrl));
}

if (isEntryPoint(process.argv[1])) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_CODES.FAILURE;
    }
  );
}
