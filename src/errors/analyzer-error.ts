/**
 * Analyzer Errors
 *
 * Every fatal failure carries a stable string code so the CLI and tests can
 * match on it without parsing messages.
 *
 * @module errors/analyzer-error
 */

export const ERROR_CODES = {
  INPUT_MALFORMED: 'ANALYZER_INPUT_MALFORMED',
  INPUT_MISSING_COLUMN: 'ANALYZER_INPUT_MISSING_COLUMN',
  INPUT_UNREADABLE: 'ANALYZER_INPUT_UNREADABLE',
  CONFIG_INVALID: 'ANALYZER_CONFIG_INVALID',
  ARTIFACT_WRITE_FAILED: 'ANALYZER_ARTIFACT_WRITE_FAILED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class AnalyzerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnalyzerError';
    this.code = code;
  }
}

/**
 * The input could not be parsed as a benchmark table.
 * `row` is 1-based and counts the header as row 1.
 */
export class MalformedInputError extends AnalyzerError {
  readonly row: number | null;
  readonly column: string | null;

  constructor(message: string, location: { row?: number; column?: string } = {}) {
    super(ERROR_CODES.INPUT_MALFORMED, message);
    this.name = 'MalformedInputError';
    this.row = location.row ?? null;
    this.column = location.column ?? null;
  }
}

export class MissingColumnError extends AnalyzerError {
  readonly columns: string[];

  constructor(columns: string[]) {
    super(
      ERROR_CODES.INPUT_MISSING_COLUMN,
      `Missing required column${columns.length === 1 ? '' : 's'}: ${columns.join(', ')}`
    );
    this.name = 'MissingColumnError';
    this.columns = columns;
  }
}

export class ConfigError extends AnalyzerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERROR_CODES.CONFIG_INVALID, message, options);
    this.name = 'ConfigError';
  }
}

export class ArtifactWriteError extends AnalyzerError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(ERROR_CODES.ARTIFACT_WRITE_FAILED, `Failed to write ${path}: ${describeError(cause)}`, { cause });
    this.name = 'ArtifactWriteError';
    this.path = path;
  }
}

export function isAnalyzerError(err: unknown): err is AnalyzerError {
  return err instanceof AnalyzerError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
