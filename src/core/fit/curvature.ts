import { CURVATURE_PREFIX_POINTS } from "../constants.js";
import { detectCollinearity } from "../collinear/detect.js";
import { hypot2, toPointMatrix } from "../math/vec.js";
import { noopTracer, type FitTracer } from "../trace.js";
import type { CurvatureFitResult, FloatVector } from "../types.js";
import { validateTrajectory } from "../validate.js";
import { radiusSquared, solveAlgebraicCircle } from "./algebraic.js";

export interface CurvatureFitOptions {
  tracer?: FitTracer;
}

const DEGENERATE_FIT: CurvatureFitResult = {
  curvature: 0,
  rmse: null,
  center: null,
  degenerate: true
};

/**
 * Least squares fit of X-Y data to a circle, returning its absolute
 * curvature and the root mean squared error of the fit in curvature
 * space: sqrt(mean((1 / |p - center| - curvature)²)).
 *
 * Collinear or nearly collinear data is not an error: it yields a
 * curvature of 0 with `rmse` and `center` set to null.
 *
 * @throws NonFiniteInputError, ShapeMismatchError, TooFewPointsError
 */
export function curvatureFit(
  x: FloatVector,
  y: FloatVector,
  options: CurvatureFitOptions = {}
): CurvatureFitResult {
  const { tracer = noopTracer } = options;
  const points = validateTrajectory(x, y, "curvatureFit");
  const n = points.x.length;

  // Assume with sufficient points some of the leading ones are non-collinear
  const degenerate = detectCollinearity(toPointMatrix(points.x, points.y), {
    prefixLength: CURVATURE_PREFIX_POINTS,
    tracer
  });
  if (degenerate) {
    tracer.onDegenerateFit?.("curvatureFit", n);
    tracer.onCurvatureFit?.(0, null);
    return { ...DEGENERATE_FIT };
  }

  const circle = solveAlgebraicCircle(points.x, points.y, "curvatureFit");
  const k = Math.abs(1 / Math.sqrt(radiusSquared(circle)));

  let sumSq = 0;
  for (let i = 0; i < n; i++) {
    const e = 1 / hypot2(points.x[i] - circle.centerX, points.y[i] - circle.centerY) - k;
    sumSq += e * e;
  }
  const rmse = Math.sqrt(sumSq / n);

  tracer.onCurvatureFit?.(k, rmse);
  return {
    curvature: k,
    rmse,
    center: { x: circle.centerX, y: circle.centerY },
    degenerate: false
  };
}

/**
 * Absolute curvature of the least squares circle through the points.
 */
export function curvature(x: FloatVector, y: FloatVector, options: CurvatureFitOptions = {}): number {
  return curvatureFit(x, y, options).curvature;
}
