/**
 * CLI Types - Shared type definitions for the analyzer CLI
 */

export type Command = 'analyze';

export interface CLIOptions {
  command: Command;
  /** Benchmark CSV path (required for analyze) */
  csv: string | null;
  /** Output directory */
  output: string;
  /** Config preset, path, or inline JSON */
  config: string | null;
  /** Slice overrides */
  batchSize: number | null;
  numHeads: number | null;
  headDim: number | null;
  /** Memory projection sequence lengths */
  seqLens: number[] | null;
  /** Explicit log level; wins over --verbose/--quiet and config */
  logLevel: string | null;
  verbose: boolean;
  quiet: boolean;
  dumpConfig: boolean;
  listPresets: boolean;
  help: boolean;
}

/**
 * Bad command line. The CLI exits with EXIT_CODES.USAGE.
 */
export class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CLIUsageError';
  }
}

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;
