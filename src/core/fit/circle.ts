import { detectCollinearity } from "../collinear/detect.js";
import { CollinearityError } from "../errors.js";
import { toPointMatrix } from "../math/vec.js";
import { noopTracer, type FitTracer } from "../trace.js";
import type { CircleFit, FloatVector } from "../types.js";
import { validateTrajectory } from "../validate.js";
import { radiusSquared, solveAlgebraicCircle } from "./algebraic.js";
import { distanceRmse } from "./rmse.js";

export interface CircleFitOptions {
  tracer?: FitTracer;
}

/**
 * Least squares fit of X-Y data to a circle.
 *
 * Returns the radius and center of the algebraic best-fit circle and the
 * root mean squared distance of the points from it.
 *
 * @throws CollinearityError if the points are (nearly) collinear
 */
export function fitCircle(x: FloatVector, y: FloatVector, options: CircleFitOptions = {}): CircleFit {
  const { tracer = noopTracer } = options;
  const points = validateTrajectory(x, y, "fitCircle");
  const n = points.x.length;

  if (detectCollinearity(toPointMatrix(points.x, points.y), { tracer })) {
    tracer.onDegenerateFit?.("fitCircle", n);
    throw new CollinearityError(
      "The points in vectors X and Y must not all be collinear, or nearly collinear, with each other",
      "fitCircle",
      n
    );
  }

  const circle = solveAlgebraicCircle(points.x, points.y, "fitCircle");
  const radius = Math.sqrt(radiusSquared(circle));
  const rmse = distanceRmse(points.x, points.y, radius, circle.centerX, circle.centerY);

  tracer.onCircleFit?.(radius, circle.centerX, circle.centerY, rmse);
  return { radius, centerX: circle.centerX, centerY: circle.centerY, rmse };
}
