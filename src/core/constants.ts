/**
 * Centralized tuning constants for the circle and curvature fitters.
 */

/**
 * Number of leading points the collinearity detector examines before
 * deciding whether a full pass over the data is needed.
 */
export const COLLINEARITY_PREFIX_POINTS = 64;

/**
 * Prefix length used by the curvature fitter's degeneracy guard.
 * Tuned separately from COLLINEARITY_PREFIX_POINTS.
 */
export const CURVATURE_PREFIX_POINTS = 50;

/**
 * Point sets smaller than this are checked for collinearity before an
 * RMSE is scored against a candidate circle.
 */
export const RMSE_COLLINEARITY_GUARD_POINTS = 20;

/**
 * Minimum number of points any circle fit accepts.
 */
export const MIN_FIT_POINTS = 3;

/**
 * Smallest window width accepted by the windowed radius aggregator.
 * A width of two yields three-point windows.
 */
export const MIN_WINDOW_WIDTH = 2;

/**
 * Rank at or below which a difference matrix counts as collinear.
 */
export const COLLINEAR_MAX_RANK = 1;
