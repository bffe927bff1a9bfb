/**
 * Runtime validation for fitter inputs.
 * Callers may be untyped, so every check starts from `unknown` and
 * narrows to plain finite numbers before any numeric work begins.
 */

import {
  InvalidParameterError,
  NonFiniteInputError,
  ShapeMismatchError,
  TooFewPointsError
} from "./errors.js";
import { MIN_FIT_POINTS, MIN_WINDOW_WIDTH } from "./constants.js";
import type { Complex, FitOperation } from "./types.js";

export function isComplex(value: unknown): value is Complex {
  return (
    typeof value === "object" &&
    value !== null &&
    "re" in value &&
    "im" in value &&
    typeof value.re === "number" &&
    typeof value.im === "number"
  );
}

function isFloatArray(value: unknown): value is Float64Array | Float32Array {
  return value instanceof Float64Array || value instanceof Float32Array;
}

/**
 * Convert one coordinate element to a finite double. Booleans and
 * integers (including bigint) are widened to floating point.
 */
export function toFiniteFloat(value: unknown, argument: string, operation: FitOperation): number {
  let converted: number;
  if (typeof value === "number") {
    converted = value;
  } else if (typeof value === "boolean") {
    converted = value ? 1 : 0;
  } else if (typeof value === "bigint") {
    converted = Number(value);
  } else if (isComplex(value)) {
    throw new NonFiniteInputError(
      `${argument} must be finite and real`,
      operation,
      argument,
      "non_real"
    );
  } else {
    throw new NonFiniteInputError(
      `${argument} must contain numeric, logical, or bigint values`,
      operation,
      argument,
      "unsupported_type"
    );
  }

  if (!Number.isFinite(converted)) {
    throw new NonFiniteInputError(
      `${argument} must be finite and real`,
      operation,
      argument,
      "non_finite"
    );
  }
  return converted;
}

/**
 * Validate a 1-D vector of finite real floating point numbers.
 */
export function validateFloatVector(
  value: unknown,
  argument: string,
  operation: FitOperation
): number[] {
  const message = `${argument.toUpperCase()} must be a finite real vector of floating point numbers`;

  let items: ArrayLike<unknown>;
  if (isFloatArray(value)) {
    items = value;
  } else if (Array.isArray(value)) {
    items = value;
  } else {
    throw new NonFiniteInputError(message, operation, argument, "unsupported_type");
  }

  const out: number[] = new Array<number>(items.length);
  for (let i = 0; i < items.length; i++) {
    const v = items[i];
    if (typeof v !== "number") {
      throw new NonFiniteInputError(
        message,
        operation,
        argument,
        isComplex(v) ? "non_real" : "unsupported_type"
      );
    }
    if (!Number.isFinite(v)) {
      throw new NonFiniteInputError(message, operation, argument, "non_finite");
    }
    out[i] = v;
  }
  return out;
}

/**
 * Validate a planar trajectory: two finite real vectors of equal length
 * holding at least `minimum` points.
 */
export function validateTrajectory(
  x: unknown,
  y: unknown,
  operation: FitOperation,
  minimum = MIN_FIT_POINTS
): { x: number[]; y: number[] } {
  const xs = validateFloatVector(x, "x", operation);
  const ys = validateFloatVector(y, "y", operation);

  if (xs.length !== ys.length) {
    throw new ShapeMismatchError(
      "The vectors X and Y must have the same length",
      operation,
      "length_mismatch"
    );
  }
  if (xs.length < minimum) {
    throw new TooFewPointsError(
      `The vectors X and Y must contain at least ${minimum} points`,
      operation,
      xs.length,
      minimum
    );
  }

  return { x: xs, y: ys };
}

/**
 * Validate a finite real scalar.
 */
export function validateFiniteScalar(
  value: unknown,
  parameter: string,
  operation: FitOperation
): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidParameterError(
      `${parameter} must be a finite real scalar`,
      operation,
      parameter,
      "non_finite"
    );
  }
  return value;
}

/**
 * Validate a candidate circle radius (finite, non-negative).
 */
export function validateRadius(value: unknown, operation: FitOperation): number {
  const r = validateFiniteScalar(value, "radius", operation);
  if (r < 0) {
    throw new InvalidParameterError(
      "radius must be a non-negative value",
      operation,
      "radius",
      "negative_radius"
    );
  }
  return r;
}

/**
 * Validate a window width: a finite integer of at least MIN_WINDOW_WIDTH.
 */
export function validateWindowWidth(value: unknown, operation: FitOperation): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new InvalidParameterError(
      "W must be a finite real integer",
      operation,
      "w",
      "non_finite"
    );
  }
  if (value < MIN_WINDOW_WIDTH || !Number.isInteger(value)) {
    throw new InvalidParameterError(
      `W must be a finite real integer greater than or equal to ${MIN_WINDOW_WIDTH}`,
      operation,
      "w",
      "invalid_integer_w"
    );
  }
  return value;
}
