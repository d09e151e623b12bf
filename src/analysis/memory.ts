/**
 * Theoretical Memory Projection
 *
 * Analytic footprint of standard attention (Q, K, V, O plus the full
 * S x S score matrix) against flash-style attention (Q, K, V, O only).
 * Independent of any measurement.
 *
 * @module analysis/memory
 */

import type { AttentionShapeSchema } from '../config/schema/index.js';

export const BYTES_PER_MB = 2 ** 20;

/** Q, K, V and O */
const QKVO_TENSORS = 4;

export interface MemoryPoint {
  seqLen: number;
  qkvBytes: number;
  attentionMatrixBytes: number;
  standardBytes: number;
  flashBytes: number;
  standardMb: number;
  flashMb: number;
}

export interface MemoryProjection {
  shape: AttentionShapeSchema;
  bytesPerElement: number;
  points: MemoryPoint[];
}

/**
 * Footprint at one sequence length.
 *
 * Values are exact while they stay below 2^53 bytes (8 PiB).
 */
export function memoryFootprint(seqLen: number, shape: AttentionShapeSchema, bytesPerElement: number): MemoryPoint {
  const { batchSize: b, numHeads: h, headDim: d } = shape;
  const qkvBytes = QKVO_TENSORS * b * h * seqLen * d * bytesPerElement;
  const attentionMatrixBytes = b * h * seqLen * seqLen * bytesPerElement;
  const standardBytes = qkvBytes + attentionMatrixBytes;
  const flashBytes = qkvBytes;

  return {
    seqLen,
    qkvBytes,
    attentionMatrixBytes,
    standardBytes,
    flashBytes,
    standardMb: standardBytes / BYTES_PER_MB,
    flashMb: flashBytes / BYTES_PER_MB,
  };
}

export function projectMemory(
  seqLens: readonly number[],
  shape: AttentionShapeSchema,
  bytesPerElement = 4
): MemoryProjection {
  return {
    shape: { ...shape },
    bytesPerElement,
    points: seqLens.map((seqLen) => memoryFootprint(seqLen, shape, bytesPerElement)),
  };
}
