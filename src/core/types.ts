export type FloatVector = readonly number[] | Float64Array | Float32Array;

export type NumericTypedArray =
  | Float64Array
  | Float32Array
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | BigInt64Array
  | BigUint64Array;

/** A single coordinate value before conversion to floating point. */
export type CoordinateScalar = number | boolean | bigint;

/**
 * One coordinate of a point set: a flat vector, or a nested rectangular
 * array whose elements are flattened row-major.
 */
export type CoordinateArray =
  | readonly CoordinateScalar[]
  | NumericTypedArray
  | readonly CoordinateArray[];

export interface Complex {
  re: number;
  im: number;
}

/** M rows (points) by N columns (coordinates). */
export type PointMatrix = readonly (readonly number[])[];

export type CoordinateMatrix = readonly (readonly CoordinateScalar[])[];

export interface Point2 {
  x: number;
  y: number;
}

export interface Circle {
  radius: number;
  centerX: number;
  centerY: number;
}

export interface CircleFit extends Circle {
  /** Root mean squared distance of the points from the fitted circle */
  rmse: number;
}

export interface CurvatureFitResult {
  /** Absolute curvature of the fitted circle; 0 for degenerate input */
  curvature: number;
  /** RMSE in curvature space; null when the input is degenerate */
  rmse: number | null;
  /** Center of the fitted circle; null when the input is degenerate */
  center: Point2 | null;
  degenerate: boolean;
}

/**
 * Elementary circle fit consumed by the windowed aggregator.
 */
export type CircleFitPrimitive = (x: readonly number[], y: readonly number[]) => CircleFit;

export interface WindowFit extends CircleFit {
  /** Index of the window's middle point */
  centerIndex: number;
  /** First index of the window */
  start: number;
  /** One past the last index of the window */
  end: number;
}

export interface MeanCircleFitResult {
  meanRadius: number;
  windows: WindowFit[];
}

export type FitOperation =
  | "isCollinear"
  | "curvatureFit"
  | "circleRmse"
  | "fitCircle"
  | "meanCircleFit";

export type CollinearityStage = "prefix" | "full";
