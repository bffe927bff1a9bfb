import { RMSE_COLLINEARITY_GUARD_POINTS } from "../constants.js";
import { detectCollinearity } from "../collinear/detect.js";
import { CollinearityError, InvalidArityError } from "../errors.js";
import { hypot2, toPointMatrix } from "../math/vec.js";
import { noopTracer, type FitTracer } from "../trace.js";
import type { FloatVector } from "../types.js";
import { validateFiniteScalar, validateRadius, validateTrajectory } from "../validate.js";

export interface CandidateCircle {
  radius: number;
  /** Defaults to 0; must be given together with centerY */
  centerX?: number;
  /** Defaults to 0; must be given together with centerX */
  centerY?: number;
}

export interface CircleRmseOptions {
  tracer?: FitTracer;
}

/**
 * sqrt(mean((|p - center| - radius)²)) without input checks.
 */
export function distanceRmse(
  x: readonly number[],
  y: readonly number[],
  radius: number,
  centerX: number,
  centerY: number
): number {
  let sumSq = 0;
  for (let i = 0; i < x.length; i++) {
    const e = hypot2(x[i] - centerX, y[i] - centerY) - radius;
    sumSq += e * e;
  }
  return Math.sqrt(sumSq / x.length);
}

function resolveCenter(centerX: unknown, centerY: unknown): [number, number] {
  if (centerX === undefined && centerY === undefined) {
    return [0, 0];
  }
  if (centerX === undefined || centerY === undefined) {
    throw new InvalidArityError(
      "Either both centerX and centerY must be specified or neither",
      "circleRmse",
      "invalid_center_arity",
      4
    );
  }
  return [
    validateFiniteScalar(centerX, "centerX", "circleRmse"),
    validateFiniteScalar(centerY, "centerY", "circleRmse")
  ];
}

/**
 * Root mean squared error of position data relative to a candidate
 * circle. Point sets smaller than RMSE_COLLINEARITY_GUARD_POINTS are
 * rejected when they are (nearly) collinear.
 *
 * @throws CollinearityError for small collinear point sets
 */
export function scoreCircle(
  x: FloatVector,
  y: FloatVector,
  circle: CandidateCircle,
  options: CircleRmseOptions = {}
): number {
  const { tracer = noopTracer } = options;
  const points = validateTrajectory(x, y, "circleRmse");
  const radius = validateRadius(circle.radius, "circleRmse");
  const [centerX, centerY] = resolveCenter(circle.centerX, circle.centerY);
  const n = points.x.length;

  if (
    n < RMSE_COLLINEARITY_GUARD_POINTS &&
    detectCollinearity(toPointMatrix(points.x, points.y), { prefixLength: Infinity, tracer })
  ) {
    throw new CollinearityError(
      "The points in vectors X and Y must not all be collinear, or nearly collinear, with each other",
      "circleRmse",
      n
    );
  }

  const rmse = distanceRmse(points.x, points.y, radius, centerX, centerY);
  tracer.onRmseScored?.(rmse, n);
  return rmse;
}

/**
 * Root mean squared error of a circle of radius `radius` centered at
 * (`centerX`, `centerY`), or at the origin when no center is given.
 */
export function circleRmse(x: FloatVector, y: FloatVector, radius: number): number;
export function circleRmse(
  x: FloatVector,
  y: FloatVector,
  radius: number,
  centerX: number,
  centerY: number
): number;
export function circleRmse(
  x: FloatVector,
  y: FloatVector,
  radius: number,
  ...center: number[]
): number {
  if (center.length > 2) {
    throw new InvalidArityError(
      "Too many input arguments",
      "circleRmse",
      "too_many_arguments",
      3 + center.length
    );
  }
  const [centerX, centerY] = center;
  return scoreCircle(x, y, { radius, centerX, centerY });
}
