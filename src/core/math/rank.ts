/**
 * Numerical rank via singular value decomposition.
 */

import { Matrix, SingularValueDecomposition } from "ml-matrix";

/**
 * Distance from |value| to the next larger double.
 */
export function spacing(value: number): number {
  const a = Math.abs(value);
  if (a < 2 ** -1022) {
    return Number.MIN_VALUE;
  }
  let e = Math.floor(Math.log2(a));
  // log2 can round across a power of two
  if (2 ** e > a) e--;
  else if (2 ** (e + 1) <= a) e++;
  return 2 ** (e - 52);
}

/**
 * Singular values of an M×N matrix, largest first.
 *
 * The N×M transpose is decomposed: on tall difference matrices the
 * untransposed path overestimates the smallest singular value by enough
 * to flip verdicts at the rank tolerance.
 */
export function singularValues(matrix: number[][]): number[] {
  if (matrix.length === 0 || matrix[0].length === 0) {
    return [];
  }
  const svd = new SingularValueDecomposition(new Matrix(matrix).transpose(), {
    computeLeftSingularVectors: false,
    computeRightSingularVectors: false,
    autoTranspose: false
  });
  return svd.diagonal.slice(0, Math.min(matrix.length, matrix[0].length));
}

/**
 * Number of singular values above `max(rows, cols) * spacing(sigma_max)`.
 */
export function numericalRank(matrix: number[][]): number {
  const s = singularValues(matrix);
  if (s.length === 0) return 0;

  const sigmaMax = Math.max(...s);
  if (sigmaMax === 0) return 0;

  const tol = Math.max(matrix.length, matrix[0].length) * spacing(sigmaMax);
  let rank = 0;
  for (const value of s) {
    if (value > tol) rank++;
  }
  return rank;
}
