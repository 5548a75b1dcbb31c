import { Decimal } from "decimal.js";

import type { Bounds, Viewport } from "../fractals/types";
import { InvalidViewportError, OutOfBoundsError } from "./errors";

const HIGH_PRECISION = 100;

// Run a conversion with raised Decimal precision, restoring the global setting afterwards
function withHighPrecision<T>(compute: () => T): T {
  const originalPrecision = Decimal.precision;
  Decimal.set({ precision: HIGH_PRECISION });

  try {
    return compute();
  } finally {
    Decimal.set({ precision: originalPrecision });
  }
}

export const isValidPixelSize = (width: number, height: number): boolean =>
  Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0;

export const isValidBounds = (bounds: Bounds): boolean =>
  [bounds.xmin, bounds.xmax, bounds.ymin, bounds.ymax].every(Number.isFinite) &&
  bounds.xmax > bounds.xmin &&
  bounds.ymax > bounds.ymin;

/**
 * Throws InvalidViewportError unless the pixel size and bounds describe a
 * drawable, non-degenerate region with a positive zoom level.
 */
export function assertValidViewport(viewport: Viewport): void {
  if (!isValidPixelSize(viewport.pixelWidth, viewport.pixelHeight)) {
    throw new InvalidViewportError(
      `Pixel size must be positive integers, got ${viewport.pixelWidth}x${viewport.pixelHeight}`
    );
  }
  if (!isValidBounds(viewport.bounds)) {
    const { xmin, xmax, ymin, ymax } = viewport.bounds;
    throw new InvalidViewportError(`Degenerate bounds (${xmin}, ${xmax}, ${ymin}, ${ymax})`);
  }
  if (!(viewport.zoomLevel > 0) || !Number.isFinite(viewport.zoomLevel)) {
    throw new InvalidViewportError(`Zoom level must be positive, got ${viewport.zoomLevel}`);
  }
}

/**
 * Maps a pixel on the surface to a point in the complex plane.
 *
 * Row 0 is the top of the surface and maps to `ymax`; column 0 maps to `xmin`.
 *
 * @throws OutOfBoundsError if the pixel is outside `[0, width) x [0, height)`
 */
export const pixelToComplex = (px: number, py: number, viewport: Viewport): { re: number; im: number } => {
  const { pixelWidth: width, pixelHeight: height, bounds } = viewport;
  if (!(px >= 0 && px < width && py >= 0 && py < height)) {
    throw new OutOfBoundsError(px, py, width, height);
  }

  return withHighPrecision(() => {
    const nx = new Decimal(px).div(width);
    const ny = new Decimal(1).minus(new Decimal(py).div(height));

    const xRange = new Decimal(bounds.xmax).minus(bounds.xmin);
    const yRange = new Decimal(bounds.ymax).minus(bounds.ymin);

    return {
      re: nx.times(xRange).plus(bounds.xmin).toNumber(),
      im: ny.times(yRange).plus(bounds.ymin).toNumber(),
    };
  });
};

/**
 * Inverse of pixelToComplex. The result is fractional and is not clipped to the surface.
 */
export const complexToPixel = (re: number, im: number, viewport: Viewport): { px: number; py: number } => {
  const { pixelWidth: width, pixelHeight: height, bounds } = viewport;

  return withHighPrecision(() => {
    const nx = new Decimal(re).minus(bounds.xmin).div(new Decimal(bounds.xmax).minus(bounds.xmin));
    const ny = new Decimal(im).minus(bounds.ymin).div(new Decimal(bounds.ymax).minus(bounds.ymin));

    return {
      px: nx.times(width).toNumber(),
      py: new Decimal(1).minus(ny).times(height).toNumber(),
    };
  });
};

/**
 * Resizes the viewport to `newWidth` x `newHeight` pixels. The x-range and the
 * center are kept; the y-range follows the new aspect ratio so pixels stay square.
 */
export function fitAspectRatio(viewport: Viewport, newWidth: number, newHeight: number): Viewport {
  if (!isValidPixelSize(newWidth, newHeight)) {
    throw new InvalidViewportError(`Cannot fit viewport to ${newWidth}x${newHeight} pixels`);
  }

  const { xmin, xmax, ymin, ymax } = viewport.bounds;
  const centerY = (ymin + ymax) / 2;
  const yRange = (xmax - xmin) * (newHeight / newWidth);

  return {
    ...viewport,
    pixelWidth: newWidth,
    pixelHeight: newHeight,
    bounds: {
      xmin,
      xmax,
      ymin: centerY - yRange / 2,
      ymax: centerY + yRange / 2,
    },
  };
}

export const boundsCenter = (bounds: Bounds): { re: number; im: number } => ({
  re: (bounds.xmin + bounds.xmax) / 2,
  im: (bounds.ymin + bounds.ymax) / 2,
});
