/**
 * Result of iterating a single point in the complex plane.
 */
export interface IterationResult {
  /** Number of iterations before escape (or maxIterations if point is in the set) */
  iter: number;
  /** Real component of final z value */
  zr: number;
  /** Imaginary component of final z value */
  zi: number;
  /** Smoothed stripe average in [0, 1]; 0.5 when stripe coloring is off */
  stripe: number;
}

/**
 * Options that shape the per-point iteration beyond the escape test.
 */
export interface IterationOptions {
  maxIterations: number;
  /** Angular frequency of the stripe term; 0 disables it */
  stripeDensity: number;
  /** Memory of the stripe average, in [0, 1) */
  stripeSigma: number;
}

/**
 * Interface implemented by the escape-time algorithms the render engines can run.
 */
export interface FractalAlgorithm {
  readonly name: string;
  readonly description?: string;

  computePoint(real: number, imag: number, options: IterationOptions): IterationResult;
}
