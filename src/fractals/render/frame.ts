// ABOUTME: Core frame computation shared by the in-process and worker render engines
// ABOUTME: Turns a viewport snapshot into an RGB pixel buffer

import type { FractalAlgorithm } from "../algorithms/base";
import { colorPoint } from "../algorithms/coloring";
import { mandelbrotAlgorithm } from "../algorithms/mandelbrot";
import type { PixelBuffer, Viewport } from "../types";

/**
 * Computes a full frame for `viewport`:
 * 1. Each pixel is split into oversampling × oversampling sub-samples
 * 2. Every sample is mapped into the bounds (row 0 → ymax) and iterated
 * 3. Sample colors are averaged and written as RGB bytes
 *
 * The signal is checked between rows, so it only stops a frame that runs on
 * another thread or was aborted before the call.
 */
export function computeFrame(
  viewport: Readonly<Viewport>,
  signal?: AbortSignal,
  algorithm: FractalAlgorithm = mandelbrotAlgorithm
): PixelBuffer {
  const buffer = createPixelBuffer(viewport);

  for (let y = 0; y < buffer.height; y++) {
    signal?.throwIfAborted();
    computeRow(viewport, y, buffer.bytes, algorithm);
  }

  return buffer;
}

export function createPixelBuffer(viewport: Readonly<Viewport>): PixelBuffer {
  const { pixelWidth: width, pixelHeight: height } = viewport;
  return { width, height, bytes: new Uint8Array(width * height * 3) };
}

/**
 * Writes row `y` of the frame into `bytes`.
 */
export function computeRow(
  viewport: Readonly<Viewport>,
  y: number,
  bytes: Uint8Array,
  algorithm: FractalAlgorithm = mandelbrotAlgorithm
): void {
  const { pixelWidth: width, pixelHeight: height, bounds, maxIterations, colorParams, oversampling } = viewport;

  const xScale = (bounds.xmax - bounds.xmin) / width;
  const yScale = (bounds.ymax - bounds.ymin) / height;
  const samples = oversampling * oversampling;
  const options = {
    maxIterations,
    stripeDensity: colorParams.stripeDensity,
    stripeSigma: colorParams.stripeSigma,
  };

  for (let x = 0; x < width; x++) {
    let r = 0;
    let g = 0;
    let b = 0;

    for (let sy = 0; sy < oversampling; sy++) {
      for (let sx = 0; sx < oversampling; sx++) {
        const real = bounds.xmin + (x + (sx + 0.5) / oversampling) * xScale;
        const imag = bounds.ymax - (y + (sy + 0.5) / oversampling) * yScale;
        const result = algorithm.computePoint(real, imag, options);
        const [cr, cg, cb] = colorPoint(result, maxIterations, colorParams);
        r += cr;
        g += cg;
        b += cb;
      }
    }

    const index = (y * width + x) * 3;
    bytes[index] = Math.round(r / samples);
    bytes[index + 1] = Math.round(g / samples);
    bytes[index + 2] = Math.round(b / samples);
  }
}
