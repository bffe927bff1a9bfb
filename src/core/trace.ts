/**
 * Lightweight tracing infrastructure for debugging fits.
 *
 * Usage:
 * ```typescript
 * import { createTracer, noopTracer } from "./trace.js";
 *
 * // For debugging:
 * const tracer = createTracer(console.log);
 *
 * // For production (no overhead):
 * const tracer = noopTracer;
 * ```
 */

import type { CollinearityStage, FitOperation, WindowFit } from "./types.js";

export interface FitTracer {
  /** Called after the rank of a closed-loop difference matrix is computed */
  onRankComputed?(stage: CollinearityStage, rows: number, rank: number): void;

  /** Called when the collinearity detector reaches a verdict */
  onCollinearityVerdict?(pointCount: number, collinear: boolean): void;

  /** Called when a fit short-circuits on degenerate input */
  onDegenerateFit?(operation: FitOperation, pointCount: number): void;

  /** Called when the curvature fitter completes */
  onCurvatureFit?(curvature: number, rmse: number | null): void;

  /** Called when the elementary circle fit completes */
  onCircleFit?(radius: number, centerX: number, centerY: number, rmse: number): void;

  /** Called when an RMSE is scored against a candidate circle */
  onRmseScored?(rmse: number, pointCount: number): void;

  /** Called after each window of the aggregator is fitted */
  onWindowFit?(window: WindowFit): void;

  /** Called when the aggregator has averaged all windows */
  onMeanRadius?(meanRadius: number, windowCount: number): void;
}

/**
 * No-op tracer that has zero overhead when tracing is disabled.
 */
export const noopTracer: FitTracer = {};

/**
 * Create a tracer that logs to a provided log function.
 */
export function createTracer(log: (message: string) => void): FitTracer {
  return {
    onRankComputed(stage, rows, rank) {
      log(`[TRACE] collinearity ${stage} pass: ${rows} difference rows, rank=${rank}`);
    },

    onCollinearityVerdict(pointCount, collinear) {
      log(`[TRACE] ${pointCount} points ${collinear ? "are" : "are not"} collinear`);
    },

    onDegenerateFit(operation, pointCount) {
      log(`[TRACE] ${operation}: degenerate input (${pointCount} points)`);
    },

    onCurvatureFit(curvature, rmse) {
      const rmseText = rmse === null ? "undefined" : rmse.toExponential(3);
      log(`[TRACE] curvatureFit: curvature=${curvature.toFixed(6)}, rmse=${rmseText}`);
    },

    onCircleFit(radius, centerX, centerY, rmse) {
      log(
        `[TRACE] fitCircle: radius=${radius.toFixed(4)}, center=(${centerX.toFixed(4)}, ${centerY.toFixed(4)}), rmse=${rmse.toExponential(3)}`
      );
    },

    onRmseScored(rmse, pointCount) {
      log(`[TRACE] circleRmse: ${pointCount} points, rmse=${rmse.toExponential(3)}`);
    },

    onWindowFit(window) {
      log(
        `[TRACE] window [${window.start}, ${window.end}) at ${window.centerIndex}: radius=${window.radius.toFixed(4)}`
      );
    },

    onMeanRadius(meanRadius, windowCount) {
      log(`[TRACE] meanCircleFit: ${windowCount} windows, mean radius=${meanRadius.toFixed(4)}`);
    }
  };
}

/**
 * Create a tracer that collects events into an array for later inspection.
 */
export interface TraceEvent {
  type: string;
  timestamp: number;
  data: Record<string, unknown>;
}

export function createCollectorTracer(): FitTracer & {
  getEvents(): TraceEvent[];
  clear(): void;
} {
  const events: TraceEvent[] = [];

  const addEvent = (type: string, data: Record<string, unknown>) => {
    events.push({ type, timestamp: Date.now(), data });
  };

  return {
    onRankComputed(stage, rows, rank) {
      addEvent("rankComputed", { stage, rows, rank });
    },
    onCollinearityVerdict(pointCount, collinear) {
      addEvent("collinearityVerdict", { pointCount, collinear });
    },
    onDegenerateFit(operation, pointCount) {
      addEvent("degenerateFit", { operation, pointCount });
    },
    onCurvatureFit(curvature, rmse) {
      addEvent("curvatureFit", { curvature, rmse });
    },
    onCircleFit(radius, centerX, centerY, rmse) {
      addEvent("circleFit", { radius, centerX, centerY, rmse });
    },
    onRmseScored(rmse, pointCount) {
      addEvent("rmseScored", { rmse, pointCount });
    },
    onWindowFit(window) {
      addEvent("windowFit", { ...window });
    },
    onMeanRadius(meanRadius, windowCount) {
      addEvent("meanRadius", { meanRadius, windowCount });
    },
    getEvents: () => [...events],
    clear: () => {
      events.length = 0;
    }
  };
}

/**
 * Merge multiple tracers into one. Each event triggers all tracers.
 */
export function mergeTracers(...tracers: FitTracer[]): FitTracer {
  return {
    onRankComputed(stage, rows, rank) {
      for (const t of tracers) t.onRankComputed?.(stage, rows, rank);
    },
    onCollinearityVerdict(pointCount, collinear) {
      for (const t of tracers) t.onCollinearityVerdict?.(pointCount, collinear);
    },
    onDegenerateFit(operation, pointCount) {
      for (const t of tracers) t.onDegenerateFit?.(operation, pointCount);
    },
    onCurvatureFit(curvature, rmse) {
      for (const t of tracers) t.onCurvatureFit?.(curvature, rmse);
    },
    onCircleFit(radius, centerX, centerY, rmse) {
      for (const t of tracers) t.onCircleFit?.(radius, centerX, centerY, rmse);
    },
    onRmseScored(rmse, pointCount) {
      for (const t of tracers) t.onRmseScored?.(rmse, pointCount);
    },
    onWindowFit(window) {
      for (const t of tracers) t.onWindowFit?.(window);
    },
    onMeanRadius(meanRadius, windowCount) {
      for (const t of tracers) t.onMeanRadius?.(meanRadius, windowCount);
    }
  };
}
