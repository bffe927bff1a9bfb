/**
 * Synthetic trajectory generation for exercising the circle fitters.
 */

export interface Trajectory {
  x: number[];
  y: number[];
}

interface NoiseConfig {
  /** Standard deviation of Gaussian noise added to each coordinate */
  noise: number;
  /** Random seed for reproducibility (if using seeded RNG) */
  seed?: number;
}

export interface SyntheticCircleConfig extends NoiseConfig {
  centerX: number;
  centerY: number;
  radius: number;
  numPoints: number;
  /** Angle of the first point (radians) */
  startAngle: number;
  /** Angle at which the arc ends (radians) */
  endAngle: number;
  /**
   * If true the arc is treated as periodic and the point at `endAngle`
   * is omitted; otherwise both ends are sampled.
   */
  closed: boolean;
}

export const DEFAULT_SYNTHETIC_CIRCLE_CONFIG: SyntheticCircleConfig = {
  centerX: 0,
  centerY: 0,
  radius: 1,
  numPoints: 32,
  startAngle: 0,
  endAngle: 2 * Math.PI,
  closed: true,
  noise: 0,
};

export interface SyntheticSpiralConfig extends NoiseConfig {
  centerX: number;
  centerY: number;
  /** Radius at the first point */
  initialRadius: number;
  /** Radius increase per radian of turning */
  growthPerRadian: number;
  startAngle: number;
  /** Angle between consecutive points (radians) */
  angleStep: number;
  numPoints: number;
}

export const DEFAULT_SYNTHETIC_SPIRAL_CONFIG: SyntheticSpiralConfig = {
  centerX: 0,
  centerY: 0,
  initialRadius: 10,
  growthPerRadian: 0.5,
  startAngle: 0,
  angleStep: 0.1,
  numPoints: 126,
  noise: 0,
};

export interface SyntheticDriftConfig extends NoiseConfig {
  centerX: number;
  centerY: number;
  radius: number;
  /** Translation of the circle center along x per radian of turning */
  driftPerRadian: number;
  angleStep: number;
  numPoints: number;
}

export const DEFAULT_SYNTHETIC_DRIFT_CONFIG: SyntheticDriftConfig = {
  centerX: 0,
  centerY: 0,
  radius: 5,
  driftPerRadian: 0.3,
  angleStep: 0.1,
  numPoints: 252,
  noise: 0,
};

type UniformSource = () => number;

/** LCG over 2^32 yielding uniforms in [0, 1). */
function lcg(seed: number): UniformSource {
  const modulus = 2 ** 32;
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % modulus;
    return state / modulus;
  };
}

/** Zero-mean Gaussian offset of the given spread (Box-Muller, cosine branch). */
function gaussianOffset(spread: number, uniform: UniformSource): number {
  const radial = Math.sqrt(-2 * Math.log(uniform() + 1e-10));
  return spread * (radial * Math.cos(2 * Math.PI * uniform()));
}

function sampleTrajectory(
  count: number,
  noiseConfig: NoiseConfig,
  at: (i: number) => [number, number]
): Trajectory {
  const uniform: UniformSource =
    noiseConfig.seed !== undefined ? lcg(noiseConfig.seed) : Math.random;
  const x: number[] = [];
  const y: number[] = [];

  for (let i = 0; i < count; i++) {
    let [px, py] = at(i);
    if (noiseConfig.noise > 0) {
      px += gaussianOffset(noiseConfig.noise, uniform);
      py += gaussianOffset(noiseConfig.noise, uniform);
    }
    x.push(px);
    y.push(py);
  }

  return { x, y };
}

/**
 * Generate points on a circle or circular arc.
 */
export function generateCirclePoints(config: Partial<SyntheticCircleConfig> = {}): Trajectory {
  const cfg = { ...DEFAULT_SYNTHETIC_CIRCLE_CONFIG, ...config };
  const intervals = cfg.closed ? cfg.numPoints : Math.max(1, cfg.numPoints - 1);
  const step = (cfg.endAngle - cfg.startAngle) / intervals;

  return sampleTrajectory(cfg.numPoints, cfg, (i) => {
    const t = cfg.startAngle + i * step;
    return [cfg.centerX + cfg.radius * Math.cos(t), cfg.centerY + cfg.radius * Math.sin(t)];
  });
}

/**
 * Generate points on an Archimedean spiral r(θ) = r0 + b·(θ - θ0).
 */
export function generateSpiralPoints(config: Partial<SyntheticSpiralConfig> = {}): Trajectory {
  const cfg = { ...DEFAULT_SYNTHETIC_SPIRAL_CONFIG, ...config };

  return sampleTrajectory(cfg.numPoints, cfg, (i) => {
    const turned = i * cfg.angleStep;
    const t = cfg.startAngle + turned;
    const r = cfg.initialRadius + cfg.growthPerRadian * turned;
    return [cfg.centerX + r * Math.cos(t), cfg.centerY + r * Math.sin(t)];
  });
}

/**
 * Generate points on a circle whose center drifts along x while it is
 * traced (a prolate trochoid for small drift).
 */
export function generateDriftingCirclePoints(config: Partial<SyntheticDriftConfig> = {}): Trajectory {
  const cfg = { ...DEFAULT_SYNTHETIC_DRIFT_CONFIG, ...config };

  return sampleTrajectory(cfg.numPoints, cfg, (i) => {
    const t = i * cfg.angleStep;
    return [
      cfg.centerX + cfg.radius * Math.cos(t) + cfg.driftPerRadian * t,
      cfg.centerY + cfg.radius * Math.sin(t),
    ];
  });
}

/**
 * Radius of curvature of the Archimedean spiral at polar radius `r`:
 * (r² + b²)^(3/2) / (r² + 2b²), where b is the growth per radian.
 */
export function spiralRadiusOfCurvature(r: number, growthPerRadian: number): number {
  const b2 = growthPerRadian * growthPerRadian;
  return Math.pow(r * r + b2, 1.5) / (r * r + 2 * b2);
}
