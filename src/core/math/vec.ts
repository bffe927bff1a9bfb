import type { PointMatrix } from "../types.js";

export function hypot2(dx: number, dy: number): number {
  return Math.sqrt(dx * dx + dy * dy);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Consecutive differences of the first `count` rows with the first row
 * appended after the last, so the wrap-around edge is included.
 * Returns `count` rows.
 */
export function closedLoopDifferences(points: PointMatrix, count = points.length): number[][] {
  const rows: number[][] = [];
  for (let i = 0; i < count; i++) {
    const a = points[i];
    const b = points[(i + 1) % count];
    const row = new Array<number>(a.length);
    for (let j = 0; j < a.length; j++) {
      row[j] = b[j] - a[j];
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Zip parallel coordinate vectors into an L×2 point matrix.
 */
export function toPointMatrix(x: readonly number[], y: readonly number[]): number[][] {
  return x.map((xi, i) => [xi, y[i]]);
}
