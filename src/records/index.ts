export { RecordStore, type RecordPredicate } from './record-store.js';
export { parseRecords, loadRecordStore, REQUIRED_COLUMNS, type RequiredColumn } from './csv-loader.js';
export {
  ATTENTION_TYPES,
  isAttentionType,
  type AttentionType,
  type BenchmarkRecord,
  type CoordinateField,
  type RecordMatch,
  type SkippedRow,
} from './types.js';
