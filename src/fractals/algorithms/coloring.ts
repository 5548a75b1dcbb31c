import type { ColorParams, RgbThetas } from "../types";
import type { IterationResult } from "./base";

export type Rgb = [number, number, number];

const channel = (value: number, theta: number): number =>
  Math.round((0.5 + 0.5 * Math.sin((value + theta) * 2 * Math.PI)) * 255);

/**
 * Sinusoidal palette: each channel is a sine wave over `value`, shifted by its theta.
 * One full color cycle per unit of `value`.
 *
 * @returns RGB tuple with values 0-255
 */
export function sinColor(value: number, thetas: RgbThetas): Rgb {
  return [channel(value, thetas[0]), channel(value, thetas[1]), channel(value, thetas[2])];
}

/**
 * Smooth (fractional) iteration count, which removes the banding of the raw count.
 */
export function smoothIterationCount(result: IterationResult): number {
  const modulus = Math.sqrt(result.zr * result.zr + result.zi * result.zi);
  if (modulus <= 1) {
    return result.iter;
  }
  return result.iter + 1 - Math.log(Math.log(modulus)) / Math.LN2;
}

/**
 * Colors an iterated point:
 * - Points in the set (iter === maxIterations): black
 * - Escaped points: the sinusoidal palette cycles once every `cycleDensity` iterations
 * - The stripe average darkens or lightens the base color when stripes are on
 * - `stepDensity` adds stepped shading bands every `stepDensity` iterations
 */
export function colorPoint(result: IterationResult, maxIterations: number, params: ColorParams): Rgb {
  if (result.iter >= maxIterations) return [0, 0, 0];

  const smoothIter = smoothIterationCount(result);
  const [r, g, b] = sinColor(smoothIter / params.cycleDensity, params.rgbThetas);

  let shade = 1;
  if (params.stripeDensity > 0) {
    shade *= 0.5 + 0.5 * result.stripe;
  }
  if (params.stepDensity > 0) {
    const steps = smoothIter / params.stepDensity;
    shade *= 0.75 + 0.25 * (1 - (steps - Math.floor(steps)));
  }

  return [Math.round(r * shade), Math.round(g * shade), Math.round(b * shade)];
}
