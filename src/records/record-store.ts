/**
 * Record Store
 *
 * Immutable, ordered collection of benchmark records. Every query returns a
 * new store; the backing array is frozen so projections can share one store
 * without coordination.
 *
 * @module records/record-store
 */

import type {
  AttentionType,
  BenchmarkRecord,
  CoordinateField,
  RecordMatch,
  SkippedRow,
} from './types.js';

export type RecordPredicate = (record: BenchmarkRecord) => boolean;

export class RecordStore implements Iterable<BenchmarkRecord> {
  readonly records: readonly BenchmarkRecord[];
  /** Rows dropped while loading; carried through every derived view */
  readonly skipped: readonly SkippedRow[];

  constructor(records: readonly BenchmarkRecord[], skipped: readonly SkippedRow[] = []) {
    this.records = Object.freeze(records.map((r) => Object.freeze({ ...r })));
    this.skipped = Object.freeze([...skipped]);
  }

  get size(): number {
    return this.records.length;
  }

  [Symbol.iterator](): Iterator<BenchmarkRecord> {
    return this.records[Symbol.iterator]();
  }

  filter(predicate: RecordPredicate): RecordStore {
    return new RecordStore(this.records.filter(predicate), this.skipped);
  }

  /**
   * Equality filter on any combination of coordinates and variant.
   */
  where(match: RecordMatch): RecordStore {
    return this.filter((record) => matches(record, match));
  }

  /**
   * First record in load order matching `match`, or null.
   * Duplicate coordinates are not merged; the earliest row wins.
   */
  first(match: RecordMatch): BenchmarkRecord | null {
    return this.records.find((record) => matches(record, match)) ?? null;
  }

  /**
   * Group by variant. Only variants that occur are present, in order of
   * first appearance.
   */
  groupByType(): Map<AttentionType, RecordStore> {
    const buckets = new Map<AttentionType, BenchmarkRecord[]>();
    for (const record of this.records) {
      const bucket = buckets.get(record.attentionType);
      if (bucket) {
        bucket.push(record);
      } else {
        buckets.set(record.attentionType, [record]);
      }
    }

    const groups = new Map<AttentionType, RecordStore>();
    for (const [type, records] of buckets) {
      groups.set(type, new RecordStore(records, this.skipped));
    }
    return groups;
  }

  /**
   * Distinct values of a coordinate, ascending.
   */
  distinct(field: CoordinateField): number[] {
    const values = new Set<number>();
    for (const record of this.records) {
      values.add(record[field]);
    }
    return [...values].sort((a, b) => a - b);
  }

  /**
   * Variants present, in order of first appearance.
   */
  attentionTypes(): AttentionType[] {
    return [...this.groupByType().keys()];
  }
}

function matches(record: BenchmarkRecord, match: RecordMatch): boolean {
  if (match.attentionType !== undefined && record.attentionType !== match.attentionType) return false;
  if (match.batchSize !== undefined && record.batchSize !== match.batchSize) return false;
  if (match.numHeads !== undefined && record.numHeads !== match.numHeads) return false;
  if (match.headDim !== undefined && record.headDim !== match.headDim) return false;
  if (match.seqLen !== undefined && record.seqLen !== match.seqLen) return false;
  return true;
}
