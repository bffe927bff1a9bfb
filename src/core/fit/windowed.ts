/**
 * Windowed circle fitting: estimate the mean local radius of curvature
 * of an ordered trajectory by fitting circles over a sliding window.
 *
 * Useful when the data carries a systematic drift (e.g. a slowly
 * spiralling trajectory) and a single global circle would misstate the
 * local radius.
 */

import { TooFewPointsError } from "../errors.js";
import { mean } from "../math/vec.js";
import { noopTracer, type FitTracer } from "../trace.js";
import type {
  CircleFitPrimitive,
  FloatVector,
  MeanCircleFitResult,
  WindowFit
} from "../types.js";
import { validateTrajectory, validateWindowWidth } from "../validate.js";
import { fitCircle } from "./circle.js";

export interface MeanCircleFitOptions {
  /** Circle fit applied to each window (defaults to fitCircle) */
  fit?: CircleFitPrimitive;
  tracer?: FitTracer;
}

/**
 * Fit a circle to every window of 2·floor(w/2) + 1 consecutive points.
 * The first and last floor(w/2) points are never window centers.
 *
 * @param w Window width, an integer >= 2
 * @returns One entry per window, in index order
 */
export function localRadii(
  x: FloatVector,
  y: FloatVector,
  w: number,
  options: MeanCircleFitOptions = {}
): WindowFit[] {
  const { tracer = noopTracer } = options;
  const fit: CircleFitPrimitive = options.fit ?? ((wx, wy) => fitCircle(wx, wy, { tracer }));

  const points = validateTrajectory(x, y, "meanCircleFit");
  const width = validateWindowWidth(w, "meanCircleFit");
  const n = points.x.length;

  const half = Math.floor(0.5 * width);
  const span = 2 * half + 1;
  if (n < span) {
    throw new TooFewPointsError(
      `A window width of ${width} needs at least ${span} points`,
      "meanCircleFit",
      n,
      span
    );
  }

  const windows: WindowFit[] = [];
  for (let i = half; i < n - half; i++) {
    const start = i - half;
    const end = i + half + 1;
    const circle = fit(points.x.slice(start, end), points.y.slice(start, end));
    const window: WindowFit = {
      centerIndex: i,
      start,
      end,
      radius: circle.radius,
      centerX: circle.centerX,
      centerY: circle.centerY,
      rmse: circle.rmse
    };
    tracer.onWindowFit?.(window);
    windows.push(window);
  }
  return windows;
}

/**
 * Mean local radius together with the per-window fits it averages.
 */
export function meanCircleFitDetailed(
  x: FloatVector,
  y: FloatVector,
  w: number,
  options: MeanCircleFitOptions = {}
): MeanCircleFitResult {
  const { tracer = noopTracer } = options;
  const windows = localRadii(x, y, w, options);

  const meanRadius = mean(windows.map((window) => window.radius));

  tracer.onMeanRadius?.(meanRadius, windows.length);
  return { meanRadius, windows };
}

/**
 * Fit portions of the data to circles and return the mean of the radii.
 */
export function meanCircleFit(
  x: FloatVector,
  y: FloatVector,
  w: number,
  options: MeanCircleFitOptions = {}
): number {
  return meanCircleFitDetailed(x, y, w, options).meanRadius;
}
