// ABOUTME: Mandelbrot set algorithm implementation
// ABOUTME: Computes escape-time iterations and a stripe average for points in the complex plane

import type { FractalAlgorithm, IterationOptions, IterationResult } from "./base";

// |z| > 1000
const ESCAPE_RADIUS_SQUARED = 1e6;

/**
 * Mandelbrot Set algorithm: iterate z → z² + c from z = 0 and count the
 * iterations until |z| leaves the escape radius.
 */
export class MandelbrotAlgorithm implements FractalAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = 0";

  computePoint(real: number, imag: number, options: IterationOptions): IterationResult {
    const { maxIterations, stripeDensity, stripeSigma } = options;
    let zr = 0;
    let zi = 0;
    let iter = 0;
    let stripe = 0.5;

    while (zr * zr + zi * zi < ESCAPE_RADIUS_SQUARED && iter < maxIterations) {
      const newZr = zr * zr - zi * zi + real;
      zi = 2 * zr * zi + imag;
      zr = newZr;
      iter++;

      if (stripeDensity > 0) {
        const term = 0.5 + 0.5 * Math.sin(stripeDensity * Math.atan2(zi, zr));
        stripe = stripeSigma * stripe + (1 - stripeSigma) * term;
      }
    }

    return { iter, zr, zi, stripe };
  }
}

export const mandelbrotAlgorithm = new MandelbrotAlgorithm();
