/**
 * Circle fitting module: curvature fit, elementary circle fit, RMSE
 * scoring, and windowed radius aggregation.
 */

export {
  computeMomentSums,
  solveAlgebraicCircle,
  radiusSquared,
  type AlgebraicCircle,
  type MomentSums,
} from "./algebraic.js";

export { curvatureFit, curvature, type CurvatureFitOptions } from "./curvature.js";

export { fitCircle, type CircleFitOptions } from "./circle.js";

export {
  circleRmse,
  scoreCircle,
  distanceRmse,
  type CandidateCircle,
  type CircleRmseOptions,
} from "./rmse.js";

export {
  localRadii,
  meanCircleFit,
  meanCircleFitDetailed,
  type MeanCircleFitOptions,
} from "./windowed.js";
