/**
 * Collinearity (degeneracy) detection on a normalized M×N point matrix.
 *
 * Points are collinear when the closed-loop consecutive differences
 * (last point joined back to the first) span at most one direction.
 * Rank is taken from the singular values, so data within floating point
 * noise of a line is reported as collinear.
 */

import { COLLINEAR_MAX_RANK, COLLINEARITY_PREFIX_POINTS } from "../constants.js";
import { closedLoopDifferences } from "../math/vec.js";
import { numericalRank } from "../math/rank.js";
import { noopTracer, type FitTracer } from "../trace.js";
import type { CollinearityStage, PointMatrix } from "../types.js";

export interface CollinearityOptions {
  /**
   * Leading points tested before the full data set. A non-collinear
   * prefix settles the verdict; a collinear one is re-checked on all
   * points when more remain. `Infinity` tests everything in one pass.
   */
  prefixLength?: number;
  tracer?: FitTracer;
}

function isClosedLoopCollinear(
  points: PointMatrix,
  count: number,
  stage: CollinearityStage,
  tracer: FitTracer
): boolean {
  const diffs = closedLoopDifferences(points, count);
  const rank = numericalRank(diffs);
  tracer.onRankComputed?.(stage, diffs.length, rank);
  return rank <= COLLINEAR_MAX_RANK;
}

/**
 * Decide whether the rows of `points` are collinear or numerically
 * indistinguishable from collinear. Fewer than three points, or fewer
 * than two coordinates per point, are always collinear.
 *
 * Rank at most one counts as collinear, so coincident points (rank 0)
 * are collinear too. A strict rank-one test would call them
 * non-collinear and hand the fitters a singular system; this also
 * decides the prefix pass when the leading points all coincide.
 */
export function detectCollinearity(points: PointMatrix, options: CollinearityOptions = {}): boolean {
  const { prefixLength = COLLINEARITY_PREFIX_POINTS, tracer = noopTracer } = options;

  const m = points.length;
  const n = m > 0 ? points[0].length : 0;

  let collinear: boolean;
  if (m <= 2 || n <= 1) {
    collinear = true;
  } else {
    const mx = Math.min(m, Math.max(1, prefixLength));
    collinear = isClosedLoopCollinear(points, mx, mx === m ? "full" : "prefix", tracer);
    if (collinear && m > mx) {
      collinear = isClosedLoopCollinear(points, m, "full", tracer);
    }
  }

  tracer.onCollinearityVerdict?.(m, collinear);
  return collinear;
}
