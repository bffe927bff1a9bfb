import assert from "node:assert/strict";
import { describe, it, expect } from "vitest";
import { detectCollinearity, isCollinear, toCollinearityPoints } from "../core/collinear/index.js";
import {
  InvalidArityError,
  NonFiniteInputError,
  ShapeMismatchError
} from "../core/errors.js";
import { generateCirclePoints } from "../core/synthetic.js";
import { createCollectorTracer } from "../core/trace.js";

function rotate<T>(values: readonly T[], by: number): T[] {
  return [...values.slice(by), ...values.slice(0, by)];
}

describe("isCollinear", () => {
  it("reports points on a line as collinear", () => {
    assert.equal(isCollinear([1, 2, 3], [1, 2, 3]), true);
  });

  it("reports a perturbation above the rank tolerance as non-collinear", () => {
    assert.equal(isCollinear([1, 2, 3], [1, 2.001, 3]), false);
    assert.equal(isCollinear([1, 2, 3], [1, 2 + 1e-9, 3]), false);
  });

  it("separates perturbations at the rank tolerance", () => {
    assert.equal(isCollinear([1, 2, 3], [1, 2 + 4 * Number.EPSILON, 3]), true);
    assert.equal(isCollinear([1, 2, 3], [1, 2 + 8 * Number.EPSILON, 3]), false);
  });

  it("always treats two or fewer points as collinear", () => {
    assert.equal(isCollinear([0, 5], [3, -1]), true);
    assert.equal(isCollinear([7], [2]), true);
    assert.equal(isCollinear([], []), true);
  });

  it("reports three non-collinear points as non-collinear", () => {
    assert.equal(isCollinear([0, 1, 0], [0, 0, 1]), false);
  });

  it("treats coincident points as collinear", () => {
    assert.equal(isCollinear([2, 2, 2], [3, 3, 3]), true);
  });

  it("includes the wrap-around edge when the path returns to its start", () => {
    // An out-and-back path along a line stays collinear
    assert.equal(isCollinear([0, 1, 2, 1, 0], [0, 2, 4, 2, 0]), true);
  });

  it("checks 3-D coordinates", () => {
    assert.equal(isCollinear([1, 2, 3], [2, 4, 6], [3, 6, 9]), true);
    assert.equal(isCollinear([1, 2, 3], [2, 4, 6], [3, 6, 10]), false);
  });

  it("checks an M×N point matrix", () => {
    assert.equal(isCollinear([[0, 0, 0], [1, 1, 1], [2, 2, 2], [3, 3, 3]]), true);
    assert.equal(isCollinear([[0, 0], [1, 0], [0, 1]]), false);
  });

  it("treats one-dimensional matrices as collinear", () => {
    assert.equal(isCollinear([[1], [2], [3]]), true);
  });

  it("checks complex values on the complex plane", () => {
    assert.equal(isCollinear([{ re: 0, im: 0 }, { re: 1, im: 1 }, { re: 2, im: 2 }]), true);
    assert.equal(isCollinear([{ re: 0, im: 0 }, { re: 1, im: 0 }, { re: 0, im: 1 }]), false);
  });

  it("treats a lone real vector as points on the real axis", () => {
    assert.equal(isCollinear([1, 5, -3, 8]), true);
  });

  it("converts boolean, bigint and integer typed array inputs", () => {
    assert.equal(isCollinear([true, false, true], [false, true, true]), false);
    assert.equal(isCollinear([1n, 2n, 3n], [2n, 4n, 6n]), true);
    assert.equal(isCollinear(Int32Array.from([0, 1, 0]), Int32Array.from([0, 0, 1])), false);
  });

  it("flattens nested coordinate arrays of equal dimensions", () => {
    assert.equal(isCollinear([[0, 1], [2, 3]], [[0, 1], [2, 3]]), true);
    assert.equal(isCollinear([[0, 1], [0, 1]], [[0, 0], [1, 1]]), false);
  });

  it("gives the same verdict for any cyclic shift of the points", () => {
    const circle = generateCirclePoints({ radius: 2, numPoints: 12 });
    const lineX = [0, 1, 2, 3, 4, 5];
    const lineY = [1, 3, 5, 7, 9, 11];

    for (let shift = 0; shift < 6; shift++) {
      assert.equal(isCollinear(rotate(circle.x, shift), rotate(circle.y, shift)), false);
      assert.equal(isCollinear(rotate(lineX, shift), rotate(lineY, shift)), true);
    }
  });

  it("returns identical results on repeated calls", () => {
    const x = [0.3, 1.7, 2.2, 4.9];
    const y = [1.1, -0.4, 2.5, 0.8];
    expect(isCollinear(x, y)).toBe(isCollinear(x, y));
  });
});

describe("isCollinear argument errors", () => {
  it("rejects calls without arguments", () => {
    assert.throws(
      () => Reflect.apply(isCollinear, undefined, []),
      (err: unknown) => err instanceof InvalidArityError && err.reason === "too_few_arguments"
    );
  });

  it("rejects more than three coordinate arrays", () => {
    assert.throws(
      () => toCollinearityPoints([[1], [2], [3], [4]]),
      (err: unknown) => err instanceof InvalidArityError && err.reason === "too_many_arguments"
    );
  });

  it("rejects vectors of different lengths", () => {
    assert.throws(
      () => isCollinear([1, 2, 3], [1, 2]),
      (err: unknown) => err instanceof ShapeMismatchError && err.reason === "length_mismatch"
    );
  });

  it("rejects mixing vectors and arrays", () => {
    assert.throws(
      () => isCollinear([1, 2, 3], [[1, 2, 3]]),
      (err: unknown) => err instanceof ShapeMismatchError && err.reason === "vector_array_mismatch"
    );
  });

  it("rejects arrays of different dimensions", () => {
    assert.throws(
      () => isCollinear([[1, 2], [3, 4]], [[1, 2, 3], [4, 5, 6]]),
      (err: unknown) => err instanceof ShapeMismatchError && err.reason === "dimension_mismatch"
    );
  });

  it("rejects ragged matrices", () => {
    assert.throws(
      () => isCollinear([[1, 2], [3]]),
      (err: unknown) => err instanceof ShapeMismatchError && err.reason === "dimension_mismatch"
    );
  });

  it("rejects non-finite coordinates", () => {
    assert.throws(
      () => isCollinear([1, NaN, 3], [1, 2, 3]),
      (err: unknown) =>
        err instanceof NonFiniteInputError && err.argument === "x" && err.reason === "non_finite"
    );
    assert.throws(
      () => isCollinear([{ re: Infinity, im: 0 }, { re: 1, im: 1 }, { re: 2, im: 2 }]),
      (err: unknown) => err instanceof NonFiniteInputError && err.reason === "non_finite"
    );
  });

  it("rejects complex values where real coordinates are required", () => {
    assert.throws(
      () => toCollinearityPoints([[{ re: 1, im: 2 }, 0, 0], [1, 2, 3]]),
      (err: unknown) =>
        err instanceof NonFiniteInputError && err.argument === "x" && err.reason === "non_real"
    );
  });

  it("rejects unsupported element types", () => {
    assert.throws(
      () => toCollinearityPoints([["a", "b", "c"], [1, 2, 3]]),
      (err: unknown) => err instanceof NonFiniteInputError && err.reason === "unsupported_type"
    );
  });
});

describe("detectCollinearity", () => {
  it("trusts a non-collinear prefix without a full pass", () => {
    const { x, y } = generateCirclePoints({ radius: 5, numPoints: 100 });
    const tracer = createCollectorTracer();

    const collinear = detectCollinearity(x.map((xi, i) => [xi, y[i]]), { tracer });

    assert.equal(collinear, false);
    const ranks = tracer.getEvents().filter((e) => e.type === "rankComputed");
    expect(ranks.map((e) => e.data)).toEqual([{ stage: "prefix", rows: 64, rank: 2 }]);
  });

  it("re-checks a collinear prefix against all points", () => {
    const points: number[][] = [];
    for (let i = 0; i < 70; i++) {
      points.push(i < 64 ? [i, i] : [i, i + 5]);
    }
    const tracer = createCollectorTracer();

    const collinear = detectCollinearity(points, { tracer });

    assert.equal(collinear, false);
    const ranks = tracer.getEvents().filter((e) => e.type === "rankComputed");
    expect(ranks.map((e) => e.data)).toEqual([
      { stage: "prefix", rows: 64, rank: 1 },
      { stage: "full", rows: 70, rank: 2 }
    ]);
  });

  it("confirms a long collinear set with the full pass", () => {
    const points: number[][] = [];
    for (let i = 0; i < 100; i++) points.push([i, 2 * i]);
    const tracer = createCollectorTracer();

    assert.equal(detectCollinearity(points, { tracer }), true);
    const events = tracer.getEvents();
    expect(events.map((e) => e.type)).toEqual([
      "rankComputed",
      "rankComputed",
      "collinearityVerdict"
    ]);
    expect(events[2].data).toEqual({ pointCount: 100, collinear: true });
  });

  it("runs a single full pass when the data fits in the prefix", () => {
    const tracer = createCollectorTracer();
    detectCollinearity([[0, 0], [1, 1], [2, 2]], { tracer });

    const ranks = tracer.getEvents().filter((e) => e.type === "rankComputed");
    expect(ranks.map((e) => e.data)).toEqual([{ stage: "full", rows: 3, rank: 1 }]);
  });

  it("honours a custom prefix length", () => {
    const points: number[][] = [];
    for (let i = 0; i < 10; i++) points.push(i < 5 ? [i, 0] : [i, 1]);
    const tracer = createCollectorTracer();

    assert.equal(detectCollinearity(points, { prefixLength: 5, tracer }), false);
    const ranks = tracer.getEvents().filter((e) => e.type === "rankComputed");
    expect(ranks.map((e) => e.data)).toEqual([
      { stage: "prefix", rows: 5, rank: 1 },
      { stage: "full", rows: 10, rank: 2 }
    ]);
  });

  it("skips rank computation for trivial inputs", () => {
    const tracer = createCollectorTracer();
    assert.equal(detectCollinearity([[1, 2], [3, 4]], { tracer }), true);
    assert.equal(detectCollinearity([[1], [2], [3]], { tracer }), true);
    expect(tracer.getEvents().filter((e) => e.type === "rankComputed")).toHaveLength(0);
  });
});
