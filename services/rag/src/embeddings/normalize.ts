import type { DenseVector, SparseVector } from "./types.js";

// Denominator substituted for a zero norm
const ZERO_NORM_EPSILON = 1e-10;

function l2Norm(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v * v;
  return Math.sqrt(sum);
}

function isDenseBatch(input: DenseVector[] | DenseVector): input is DenseVector[] {
  return input.length === 0 || Array.isArray(input[0]);
}

function isSparseBatch(input: SparseVector[] | SparseVector): input is SparseVector[] {
  return Array.isArray(input);
}

/**
 * Scale each dense vector to unit L2 norm. A single vector is treated as a
 * one-element batch. Zero vectors come back as zeros.
 */
export function normalizeDense(input: DenseVector[] | DenseVector): DenseVector[] {
  const batch = isDenseBatch(input) ? input : [input];
  return batch.map((vector) => {
    const norm = l2Norm(vector) || ZERO_NORM_EPSILON;
    return vector.map((v) => v / norm);
  });
}

/**
 * Scale each sparse vector's values to unit L2 norm; indices are kept as is.
 * Zero-norm values are returned unchanged.
 */
export function normalizeSparse(input: SparseVector[] | SparseVector): SparseVector[] {
  const batch = isSparseBatch(input) ? input : [input];
  return batch.map(({ indices, values }) => {
    const norm = l2Norm(values);
    return {
      indices: [...indices],
      values: norm > 0 ? values.map((v) => v / norm) : [...values],
    };
  });
}
