export { detectCollinearity, isCollinear, toCollinearityPoints } from "./collinear/index.js";
export {
  curvatureFit,
  curvature,
  fitCircle,
  circleRmse,
  scoreCircle,
  localRadii,
  meanCircleFit,
  meanCircleFitDetailed
} from "./fit/index.js";
export {
  generateCirclePoints,
  generateSpiralPoints,
  generateDriftingCirclePoints,
  spiralRadiusOfCurvature,
  DEFAULT_SYNTHETIC_CIRCLE_CONFIG,
  DEFAULT_SYNTHETIC_SPIRAL_CONFIG,
  DEFAULT_SYNTHETIC_DRIFT_CONFIG
} from "./synthetic.js";
export { noopTracer, createTracer, createCollectorTracer, mergeTracers } from "./trace.js";
export {
  CircleFitError,
  CollinearityError,
  InvalidArityError,
  InvalidParameterError,
  NonFiniteInputError,
  ShapeMismatchError,
  TooFewPointsError
} from "./errors.js";
export * from "./constants.js";
export type { CollinearityOptions } from "./collinear/index.js";
export type {
  CandidateCircle,
  CircleFitOptions,
  CircleRmseOptions,
  CurvatureFitOptions,
  MeanCircleFitOptions
} from "./fit/index.js";
export type {
  SyntheticCircleConfig,
  SyntheticDriftConfig,
  SyntheticSpiralConfig,
  Trajectory
} from "./synthetic.js";
export type { FitTracer, TraceEvent } from "./trace.js";
export type { CircleFitErrorCode } from "./errors.js";
export type {
  Circle,
  CircleFit,
  CircleFitPrimitive,
  CollinearityStage,
  Complex,
  CoordinateArray,
  CoordinateMatrix,
  CoordinateScalar,
  CurvatureFitResult,
  FitOperation,
  FloatVector,
  MeanCircleFitResult,
  NumericTypedArray,
  Point2,
  PointMatrix,
  WindowFit
} from "./types.js";
