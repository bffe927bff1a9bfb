/**
 * Domain-specific error types for the circle fitters.
 *
 * Every error records which operation raised it and a stable `code`
 * naming its kind, so callers can branch without parsing messages.
 */

import type { FitOperation } from "./types.js";

export type CircleFitErrorCode =
  | "ShapeMismatch"
  | "NonFiniteInput"
  | "TooFewPoints"
  | "InvalidScalarParameter"
  | "InvalidArity"
  | "Collinearity";

/**
 * Base error class for all circle fitting errors.
 */
export class CircleFitError extends Error {
  readonly code: CircleFitErrorCode;
  readonly operation: FitOperation;

  constructor(message: string, code: CircleFitErrorCode, operation: FitOperation) {
    super(message);
    this.name = "CircleFitError";
    this.code = code;
    this.operation = operation;
  }
}

/**
 * Error thrown when coordinate inputs disagree in length, shape, or in
 * being vectors versus nested arrays.
 */
export class ShapeMismatchError extends CircleFitError {
  readonly reason: "length_mismatch" | "vector_array_mismatch" | "dimension_mismatch";

  constructor(message: string, operation: FitOperation, reason: ShapeMismatchError["reason"]) {
    super(message, "ShapeMismatch", operation);
    this.name = "ShapeMismatchError";
    this.reason = reason;
  }
}

/**
 * Error thrown when a coordinate is NaN, infinite, complex where a real
 * value is required, or of an unsupported type.
 */
export class NonFiniteInputError extends CircleFitError {
  readonly argument: string;
  readonly reason: "non_finite" | "non_real" | "unsupported_type";

  constructor(
    message: string,
    operation: FitOperation,
    argument: string,
    reason: NonFiniteInputError["reason"]
  ) {
    super(message, "NonFiniteInput", operation);
    this.name = "NonFiniteInputError";
    this.argument = argument;
    this.reason = reason;
  }
}

/**
 * Error thrown when a point set is smaller than the algorithm requires.
 */
export class TooFewPointsError extends CircleFitError {
  readonly pointCount: number;
  readonly minimum: number;

  constructor(message: string, operation: FitOperation, pointCount: number, minimum: number) {
    super(message, "TooFewPoints", operation);
    this.name = "TooFewPointsError";
    this.pointCount = pointCount;
    this.minimum = minimum;
  }
}

/**
 * Error thrown when a scalar parameter (radius, center, window width)
 * is out of range.
 */
export class InvalidParameterError extends CircleFitError {
  readonly parameter: string;
  readonly reason: "non_finite" | "negative_radius" | "invalid_integer_w";

  constructor(
    message: string,
    operation: FitOperation,
    parameter: string,
    reason: InvalidParameterError["reason"]
  ) {
    super(message, "InvalidScalarParameter", operation);
    this.name = "InvalidParameterError";
    this.parameter = parameter;
    this.reason = reason;
  }
}

/**
 * Error thrown when an operation receives the wrong number of arguments.
 */
export class InvalidArityError extends CircleFitError {
  readonly reason: "too_few_arguments" | "too_many_arguments" | "invalid_center_arity";
  readonly argumentCount: number;

  constructor(
    message: string,
    operation: FitOperation,
    reason: InvalidArityError["reason"],
    argumentCount: number
  ) {
    super(message, "InvalidArity", operation);
    this.name = "InvalidArityError";
    this.reason = reason;
    this.argumentCount = argumentCount;
  }
}

/**
 * Error thrown when the points are (nearly) collinear and the requested
 * result has no meaning for a straight line.
 */
export class CollinearityError extends CircleFitError {
  readonly pointCount: number;

  constructor(message: string, operation: FitOperation, pointCount: number) {
    super(message, "Collinearity", operation);
    this.name = "CollinearityError";
    this.pointCount = pointCount;
  }
}
