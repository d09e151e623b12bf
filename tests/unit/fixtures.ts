import { RecordStore, type AttentionType, type BenchmarkRecord } from '../../src/records/index.js';

export const CSV_HEADER = 'attention_type,batch_size,num_heads,seq_len,head_dim,time_ms,tflops,bandwidth_gbps';

export function record(
  attentionType: AttentionType,
  seqLen: number,
  timeMs: number,
  overrides: Partial<BenchmarkRecord> = {}
): BenchmarkRecord {
  return {
    attentionType,
    batchSize: 1,
    numHeads: 8,
    headDim: 64,
    seqLen,
    timeMs,
    tflops: 1,
    bandwidthGbps: 100,
    ...overrides,
  };
}

export function storeOf(...records: BenchmarkRecord[]): RecordStore {
  return new RecordStore(records);
}

/**
 * Three variants over seqLen 128/256/512 in the default slice, listed out
 * of order, plus one naive row outside the slice.
 */
export const SWEEP_CSV = [
  CSV_HEADER,
  'naive,1,8,512,64,16.0,0.5,120.0',
  'naive,1,8,128,64,1.0,0.25,80.0',
  'naive,1,8,256,64,4.0,0.4,100.0',
  'shared,1,8,128,64,0.5,0.6,150.0',
  'shared,1,8,256,64,2.0,0.8,180.0',
  'shared,1,8,512,64,4.0,1.2,210.0',
  'flash,1,8,128,64,0.25,1.1,240.0',
  'flash,1,8,256,64,1.0,1.6,300.0',
  'flash,1,8,512,64,2.0,2.5,360.0',
  'naive,2,8,128,64,9.0,0.3,90.0',
  '',
].join('\n');
