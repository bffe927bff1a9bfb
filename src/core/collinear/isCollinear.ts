/**
 * Argument adapters for the collinearity detector.
 *
 * Coordinate vectors, nested coordinate arrays, M×N point matrices and
 * complex-plane vectors are all normalized into one real point matrix
 * before `detectCollinearity` runs.
 */

import { InvalidArityError, NonFiniteInputError, ShapeMismatchError } from "../errors.js";
import { isComplex, toFiniteFloat } from "../validate.js";
import { detectCollinearity } from "./detect.js";
import type {
  Complex,
  CoordinateArray,
  CoordinateMatrix,
  NumericTypedArray
} from "../types.js";

const OPERATION = "isCollinear";
const COORDINATE_NAMES = ["x", "y", "z"] as const;

interface FlattenedCoordinates {
  /** Flat vectors and typed arrays have a one-element shape */
  shape: number[];
  leaves: unknown[];
}

function isNumericTypedArray(value: unknown): value is NumericTypedArray {
  return (
    value instanceof Float64Array ||
    value instanceof Float32Array ||
    value instanceof Int8Array ||
    value instanceof Uint8Array ||
    value instanceof Uint8ClampedArray ||
    value instanceof Int16Array ||
    value instanceof Uint16Array ||
    value instanceof Int32Array ||
    value instanceof Uint32Array ||
    value instanceof BigInt64Array ||
    value instanceof BigUint64Array
  );
}

function asArrayLike(value: unknown): ArrayLike<unknown> | null {
  if (Array.isArray(value)) return value;
  if (isNumericTypedArray(value)) return value;
  return null;
}

function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((d, i) => d === b[i]);
}

function flattenCoordinates(value: unknown, argument: string): FlattenedCoordinates {
  const items = asArrayLike(value);
  if (items === null) {
    throw new NonFiniteInputError(
      `${argument} must be a vector or array of numeric, logical, or bigint values`,
      OPERATION,
      argument,
      "unsupported_type"
    );
  }

  const leaves: unknown[] = [];
  let childShape: number[] | null = null;

  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    let shape: number[];
    if (asArrayLike(item) === null) {
      shape = [];
      leaves.push(item);
    } else {
      const inner = flattenCoordinates(item, argument);
      shape = inner.shape;
      for (const leaf of inner.leaves) leaves.push(leaf);
    }

    if (childShape === null) {
      childShape = shape;
    } else if (!sameShape(childShape, shape)) {
      throw new ShapeMismatchError(
        `${argument} must be a rectangular array`,
        OPERATION,
        "dimension_mismatch"
      );
    }
  }

  return { shape: [items.length, ...(childShape ?? [])], leaves };
}

function complexToPoint(value: unknown): number[] {
  if (!isComplex(value)) {
    return [toFiniteFloat(value, "z", OPERATION), 0];
  }
  if (!Number.isFinite(value.re) || !Number.isFinite(value.im)) {
    throw new NonFiniteInputError("Z must be finite", OPERATION, "z", "non_finite");
  }
  return [value.re, value.im];
}

function singleArgumentPoints(v: unknown): number[][] {
  const { shape, leaves } = flattenCoordinates(v, "v");

  if (shape.length === 1 || leaves.some(isComplex)) {
    return leaves.map(complexToPoint);
  }
  if (shape.length !== 2) {
    throw new ShapeMismatchError("V must be a 2-D matrix", OPERATION, "dimension_mismatch");
  }

  const [m, n] = shape;
  const rows: number[][] = [];
  for (let i = 0; i < m; i++) {
    const row = new Array<number>(n);
    for (let j = 0; j < n; j++) {
      row[j] = toFiniteFloat(leaves[i * n + j], "v", OPERATION);
    }
    rows.push(row);
  }
  return rows;
}

function checkShapes(coordinates: readonly FlattenedCoordinates[]): void {
  const names = COORDINATE_NAMES.slice(0, coordinates.length).map((c) => c.toUpperCase());
  const listed = names.join(coordinates.length === 2 ? " and " : ", ");
  const [first, ...rest] = coordinates;
  const firstIsVector = first.shape.length === 1;

  if (rest.some((c) => (c.shape.length === 1) !== firstIsVector)) {
    throw new ShapeMismatchError(
      `${listed} must all be vectors or arrays of equal dimensions`,
      OPERATION,
      "vector_array_mismatch"
    );
  }

  if (firstIsVector) {
    if (rest.some((c) => c.leaves.length !== first.leaves.length)) {
      throw new ShapeMismatchError(
        `The vectors ${listed} must have the same length`,
        OPERATION,
        "length_mismatch"
      );
    }
  } else if (rest.some((c) => !sameShape(c.shape, first.shape))) {
    throw new ShapeMismatchError(
      `The arrays ${listed} must have the same dimensions`,
      OPERATION,
      "dimension_mismatch"
    );
  }
}

/**
 * Normalize `isCollinear` arguments into an M×N real point matrix.
 */
export function toCollinearityPoints(args: readonly unknown[]): number[][] {
  if (args.length === 0) {
    throw new InvalidArityError("Too few input arguments", OPERATION, "too_few_arguments", 0);
  }
  if (args.length > COORDINATE_NAMES.length) {
    throw new InvalidArityError(
      "Too many input arguments",
      OPERATION,
      "too_many_arguments",
      args.length
    );
  }
  if (args.length === 1) {
    return singleArgumentPoints(args[0]);
  }

  const coordinates = args.map((arg, i) => {
    const argument = COORDINATE_NAMES[i];
    const flattened = flattenCoordinates(arg, argument);
    // Real coordinates are checked per argument before shapes are compared
    return {
      shape: flattened.shape,
      leaves: flattened.leaves.map((leaf) => toFiniteFloat(leaf, argument, OPERATION))
    };
  });
  checkShapes(coordinates);

  const m = coordinates[0].leaves.length;
  const rows: number[][] = [];
  for (let i = 0; i < m; i++) {
    rows.push(coordinates.map((c) => c.leaves[i]));
  }
  return rows;
}

/**
 * Returns true if the points are collinear, or nearly collinear, with
 * respect to each other.
 *
 * - `isCollinear(x, y)` / `isCollinear(x, y, z)`: planar or 3-D
 *   coordinates as vectors, or as nested arrays of equal dimensions.
 * - `isCollinear(v)`: an M×N matrix whose rows are points.
 * - `isCollinear(z)`: complex values on the complex plane.
 *
 * Two or fewer points, or fewer than two dimensions, are always
 * collinear. Booleans and integers are converted to floating point.
 */
export function isCollinear(v: CoordinateMatrix | readonly Complex[] | CoordinateArray): boolean;
export function isCollinear(x: CoordinateArray, y: CoordinateArray): boolean;
export function isCollinear(x: CoordinateArray, y: CoordinateArray, z: CoordinateArray): boolean;
export function isCollinear(...args: unknown[]): boolean {
  return detectCollinearity(toCollinearityPoints(args));
}
