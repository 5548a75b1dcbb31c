import type { Viewport } from "../fractals/types";
import { InvalidViewportError } from "./errors";

/**
 * Recenters the viewport on (targetRe, targetIm) and scales its half-width by
 * `factor`: below 1 zooms in, above 1 zooms out. The half-height is derived
 * from the pixel aspect ratio, never scaled on its own.
 *
 * Callers push the current bounds onto the history stack before calling this.
 */
export function zoomAt(viewport: Viewport, targetRe: number, targetIm: number, factor: number): Viewport {
  if (!(factor > 0) || !Number.isFinite(factor)) {
    throw new InvalidViewportError(`Zoom factor must be a positive number, got ${factor}`);
  }
  if (!Number.isFinite(targetRe) || !Number.isFinite(targetIm)) {
    throw new InvalidViewportError(`Zoom target (${targetRe}, ${targetIm}) is not a finite point`);
  }

  const { bounds, pixelWidth, pixelHeight } = viewport;
  const halfWidth = ((bounds.xmax - bounds.xmin) / 2) * factor;
  const halfHeight = halfWidth * (pixelHeight / pixelWidth);

  return {
    ...viewport,
    bounds: {
      xmin: targetRe - halfWidth,
      xmax: targetRe + halfWidth,
      ymin: targetIm - halfHeight,
      ymax: targetIm + halfHeight,
    },
    zoomLevel: viewport.zoomLevel / factor,
  };
}

/**
 * Moves the view so the image follows a drag of (dx, dy) screen pixels:
 * dragging right reveals what lies to the left, dragging down reveals what lies above.
 */
export function panBy(viewport: Viewport, dx: number, dy: number): Viewport {
  if (!Number.isFinite(dx) || !Number.isFinite(dy)) {
    throw new InvalidViewportError(`Pan delta (${dx}, ${dy}) is not finite`);
  }

  const { bounds, pixelWidth, pixelHeight } = viewport;
  const offsetRe = -dx * ((bounds.xmax - bounds.xmin) / pixelWidth);
  const offsetIm = dy * ((bounds.ymax - bounds.ymin) / pixelHeight);

  return {
    ...viewport,
    bounds: {
      xmin: bounds.xmin + offsetRe,
      xmax: bounds.xmax + offsetRe,
      ymin: bounds.ymin + offsetIm,
      ymax: bounds.ymax + offsetIm,
    },
  };
}
