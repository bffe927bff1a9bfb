/**
 * Algebraic (Kåsa) least-squares circle fit.
 *
 * The circle x² + y² = a·x + b·y + c is linear in (a, b, c); its normal
 * equations are built from moment sums and solved by LU decomposition.
 * The center is (a/2, b/2) and the squared radius is c + |center|².
 */

import { LuDecomposition, Matrix } from "ml-matrix";
import { CollinearityError } from "../errors.js";
import type { FitOperation } from "../types.js";

export interface AlgebraicCircle {
  centerX: number;
  centerY: number;
  /** Constant term c of the fitted circle equation */
  c: number;
}

export interface MomentSums {
  n: number;
  sx: number;
  sy: number;
  sxx: number;
  syy: number;
  sxy: number;
  /** Σ(x² + y²)·x */
  sxxyyX: number;
  /** Σ(x² + y²)·y */
  sxxyyY: number;
}

export function computeMomentSums(x: readonly number[], y: readonly number[]): MomentSums {
  const sums: MomentSums = { n: x.length, sx: 0, sy: 0, sxx: 0, syy: 0, sxy: 0, sxxyyX: 0, sxxyyY: 0 };
  for (let i = 0; i < x.length; i++) {
    const xi = x[i];
    const yi = y[i];
    const xx = xi * xi;
    const yy = yi * yi;
    sums.sx += xi;
    sums.sy += yi;
    sums.sxx += xx;
    sums.syy += yy;
    sums.sxy += xi * yi;
    sums.sxxyyX += (xx + yy) * xi;
    sums.sxxyyY += (xx + yy) * yi;
  }
  return sums;
}

/**
 * Solve the normal equations
 *
 * ```
 * [ Sx  Sy  L  ]   [a]   [ Sxx+Syy    ]
 * [ Sxy Syy Sy ] · [b] = [ Σ(x²+y²)·y ]
 * [ Sxx Sxy Sx ]   [c]   [ Σ(x²+y²)·x ]
 * ```
 *
 * @throws CollinearityError if the system is exactly singular
 */
export function solveAlgebraicCircle(
  x: readonly number[],
  y: readonly number[],
  operation: FitOperation
): AlgebraicCircle {
  const s = computeMomentSums(x, y);

  const normal = new Matrix([
    [s.sx, s.sy, s.n],
    [s.sxy, s.syy, s.sy],
    [s.sxx, s.sxy, s.sx]
  ]);
  const rhs = Matrix.columnVector([s.sxx + s.syy, s.sxxyyY, s.sxxyyX]);

  const lu = new LuDecomposition(normal);
  if (lu.isSingular()) {
    throw new CollinearityError(
      "The circle normal equations are singular; the points are degenerate",
      operation,
      s.n
    );
  }
  const solution = lu.solve(rhs);

  return {
    centerX: 0.5 * solution.get(0, 0),
    centerY: 0.5 * solution.get(1, 0),
    c: solution.get(2, 0)
  };
}

/**
 * Squared radius of an algebraic circle.
 */
export function radiusSquared(circle: AlgebraicCircle): number {
  return circle.centerX * circle.centerX + circle.centerY * circle.centerY + circle.c;
}
