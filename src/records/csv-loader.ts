/**
 * CSV Loader
 *
 * Parses the benchmark runner's CSV output into a RecordStore. A table
 * that cannot be parsed or typed aborts the load; there is no partial
 * recovery. The one tolerated gap is the runner's `N/A` marker in a
 * measurement column, which means the kernel produced no number: that row
 * is dropped and listed in `RecordStore.skipped`.
 *
 * @module records/csv-loader
 */

import { readFile } from 'fs/promises';
import Papa from 'papaparse';

import { log } from '../debug/index.js';
import {
  AnalyzerError,
  ERROR_CODES,
  MalformedInputError,
  MissingColumnError,
  describeError,
} from '../errors/analyzer-error.js';
import { RecordStore } from './record-store.js';
import { isAttentionType, type BenchmarkRecord, type SkippedRow } from './types.js';

// =============================================================================
// Columns
// =============================================================================

export const REQUIRED_COLUMNS = [
  'attention_type',
  'batch_size',
  'num_heads',
  'head_dim',
  'seq_len',
  'time_ms',
  'tflops',
  'bandwidth_gbps',
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

type CsvRow = Record<string, string | undefined>;

/** Marker the runner writes when a measurement could not be parsed */
const NOT_AVAILABLE = 'N/A';

const MEASUREMENT_COLUMNS: readonly RequiredColumn[] = ['time_ms', 'tflops', 'bandwidth_gbps'];

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse CSV text into a RecordStore.
 *
 * @throws MalformedInputError when the text is not a well-formed table or a
 *   value cannot be typed
 * @throws MissingColumnError when any required column is absent
 */
export function parseRecords(text: string): RecordStore {
  const parsed = Papa.parse<CsvRow>(text.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fields = parsed.meta.fields ?? [];
  if (fields.length === 0 || fields.every((f) => f === '')) {
    throw new MalformedInputError('Input contains no header row');
  }

  const firstError = parsed.errors[0];
  if (firstError) {
    const row = firstError.row === undefined ? undefined : firstError.row + 2;
    throw new MalformedInputError(
      `Input is not a well-formed table${row === undefined ? '' : ` (row ${row})`}: ${firstError.message}`,
      { row }
    );
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnError(missing);
  }

  const records: BenchmarkRecord[] = [];
  const skipped: SkippedRow[] = [];

  parsed.data.forEach((row, index) => {
    const rowNumber = index + 2;
    const unavailable = MEASUREMENT_COLUMNS.filter((column) => readCell(row, column, rowNumber) === NOT_AVAILABLE);
    if (unavailable.length > 0) {
      skipped.push({ row: rowNumber, reason: `${unavailable.join(', ')} not available` });
      return;
    }
    records.push(parseRow(row, rowNumber));
  });

  for (const entry of skipped) {
    log.warn('Records', `Skipping row ${entry.row}: ${entry.reason}`);
  }
  log.verbose('Records', `Parsed ${records.length} records (${skipped.length} skipped)`);

  return new RecordStore(records, skipped);
}

/**
 * Read and parse a CSV file.
 */
export async function loadRecordStore(path: string): Promise<RecordStore> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new AnalyzerError(ERROR_CODES.INPUT_UNREADABLE, `Cannot read ${path}: ${describeError(err)}`, {
      cause: err,
    });
  }
  return parseRecords(text);
}

// =============================================================================
// Row Typing
// =============================================================================

function parseRow(row: CsvRow, rowNumber: number): BenchmarkRecord {
  const attentionType = readCell(row, 'attention_type', rowNumber);
  if (!isAttentionType(attentionType)) {
    throw new MalformedInputError(
      `Unknown attention_type "${attentionType}" at row ${rowNumber}`,
      { row: rowNumber, column: 'attention_type' }
    );
  }

  return {
    attentionType,
    batchSize: readPositiveInt(row, 'batch_size', rowNumber),
    numHeads: readPositiveInt(row, 'num_heads', rowNumber),
    headDim: readPositiveInt(row, 'head_dim', rowNumber),
    seqLen: readPositiveInt(row, 'seq_len', rowNumber),
    timeMs: readNumber(row, 'time_ms', rowNumber, { positive: true }),
    tflops: readNumber(row, 'tflops', rowNumber, { positive: false }),
    bandwidthGbps: readNumber(row, 'bandwidth_gbps', rowNumber, { positive: false }),
  };
}

function readCell(row: CsvRow, column: RequiredColumn, rowNumber: number): string {
  const value = row[column];
  if (value === undefined) {
    throw new MalformedInputError(`Row ${rowNumber} has no value for ${column}`, { row: rowNumber, column });
  }
  return value.trim();
}

function readPositiveInt(row: CsvRow, column: RequiredColumn, rowNumber: number): number {
  const raw = readCell(row, column, rowNumber);
  const value = raw === '' ? NaN : Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new MalformedInputError(
      `${column} must be a positive integer, got "${raw}" at row ${rowNumber}`,
      { row: rowNumber, column }
    );
  }
  return value;
}

function readNumber(
  row: CsvRow,
  column: RequiredColumn,
  rowNumber: number,
  { positive }: { positive: boolean }
): number {
  const raw = readCell(row, column, rowNumber);
  const value = raw === '' ? NaN : Number(raw);
  const inRange = positive ? value > 0 : value >= 0;
  if (!Number.isFinite(value) || !inRange) {
    const expected = positive ? 'a positive number' : 'a non-negative number';
    throw new MalformedInputError(
      `${column} must be ${expected}, got "${raw}" at row ${rowNumber}`,
      { row: rowNumber, column }
    );
  }
  return value;
}
