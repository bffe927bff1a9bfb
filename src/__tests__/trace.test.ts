import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  noopTracer,
  createTracer,
  createCollectorTracer,
  mergeTracers
} from "../core/trace.js";
import { curvatureFit } from "../core/fit/curvature.js";
import type { WindowFit } from "../core/types.js";

const WINDOW: WindowFit = {
  centerIndex: 3,
  start: 1,
  end: 6,
  radius: 2.5,
  centerX: 0,
  centerY: 0,
  rmse: 0.01
};

describe("noopTracer", () => {
  it("has no methods defined (zero overhead)", () => {
    assert.equal(Object.keys(noopTracer).length, 0);
  });

  it("can be called without error", () => {
    noopTracer.onRankComputed?.("prefix", 64, 2);
    noopTracer.onCollinearityVerdict?.(100, false);
    noopTracer.onWindowFit?.(WINDOW);
  });
});

describe("createTracer", () => {
  it("logs to the provided function", () => {
    const logs: string[] = [];
    const tracer = createTracer((msg) => logs.push(msg));

    tracer.onRankComputed?.("prefix", 64, 2);
    tracer.onCollinearityVerdict?.(100, false);
    tracer.onDegenerateFit?.("curvatureFit", 4);

    assert.deepEqual(logs, [
      "[TRACE] collinearity prefix pass: 64 difference rows, rank=2",
      "[TRACE] 100 points are not collinear",
      "[TRACE] curvatureFit: degenerate input (4 points)"
    ]);
  });

  it("formats fit results", () => {
    const logs: string[] = [];
    const tracer = createTracer((msg) => logs.push(msg));

    tracer.onCurvatureFit?.(0, null);
    tracer.onCurvatureFit?.(0.25, 0.0015);
    tracer.onWindowFit?.(WINDOW);
    tracer.onMeanRadius?.(2.5, 12);

    assert.deepEqual(logs, [
      "[TRACE] curvatureFit: curvature=0.000000, rmse=undefined",
      "[TRACE] curvatureFit: curvature=0.250000, rmse=1.500e-3",
      "[TRACE] window [1, 6) at 3: radius=2.5000",
      "[TRACE] meanCircleFit: 12 windows, mean radius=2.5000"
    ]);
  });

  it("logs a full curvature fit", () => {
    const logs: string[] = [];
    curvatureFit([0, 1, 2], [0, 1, 2], { tracer: createTracer((msg) => logs.push(msg)) });

    assert.deepEqual(logs, [
      "[TRACE] collinearity full pass: 3 difference rows, rank=1",
      "[TRACE] 3 points are collinear",
      "[TRACE] curvatureFit: degenerate input (3 points)",
      "[TRACE] curvatureFit: curvature=0.000000, rmse=undefined"
    ]);
  });
});

describe("createCollectorTracer", () => {
  it("collects events", () => {
    const tracer = createCollectorTracer();

    tracer.onRmseScored?.(0.5, 10);
    tracer.onCircleFit?.(3, 1, -1, 0);

    const events = tracer.getEvents();
    assert.equal(events.length, 2);
    assert.equal(events[0].type, "rmseScored");
    assert.deepEqual(events[0].data, { rmse: 0.5, pointCount: 10 });
    assert.equal(events[1].type, "circleFit");
    assert.deepEqual(events[1].data, { radius: 3, centerX: 1, centerY: -1, rmse: 0 });
  });

  it("can clear events", () => {
    const tracer = createCollectorTracer();
    tracer.onWindowFit?.(WINDOW);
    assert.equal(tracer.getEvents().length, 1);

    tracer.clear();
    assert.equal(tracer.getEvents().length, 0);
  });

  it("returns a copy of events", () => {
    const tracer = createCollectorTracer();
    tracer.onMeanRadius?.(1, 1);

    const events1 = tracer.getEvents();
    const events2 = tracer.getEvents();
    assert.notEqual(events1, events2);
    assert.deepEqual(events1, events2);
  });
});

describe("mergeTracers", () => {
  it("calls all tracers", () => {
    const logs1: string[] = [];
    const logs2: string[] = [];
    const merged = mergeTracers(
      createTracer((msg) => logs1.push(msg)),
      createTracer((msg) => logs2.push(msg))
    );

    merged.onCollinearityVerdict?.(3, true);

    assert.equal(logs1.length, 1);
    assert.equal(logs2.length, 1);
  });

  it("handles tracers with partial implementations", () => {
    let verdicts = 0;
    const merged = mergeTracers(
      { onCollinearityVerdict: () => verdicts++ },
      noopTracer
    );

    merged.onCollinearityVerdict?.(3, true);
    merged.onRankComputed?.("full", 3, 1);

    assert.equal(verdicts, 1);
  });
});
