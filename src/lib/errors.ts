/**
 * Raised when a viewport mutation would break an invariant (non-positive
 * pixel size, degenerate bounds, bad zoom factor). The mutation is not applied.
 */
export class InvalidViewportError extends Error {
  readonly name = "InvalidViewportError";
}

/**
 * Raised when a pixel coordinate lies outside the current surface.
 */
export class OutOfBoundsError extends Error {
  readonly name = "OutOfBoundsError";

  constructor(
    readonly px: number,
    readonly py: number,
    readonly width: number,
    readonly height: number
  ) {
    super(`Pixel (${px}, ${py}) is outside the ${width}x${height} surface`);
  }
}

/**
 * Raised by render engines when a frame cannot be produced.
 */
export class RenderFailureError extends Error {
  readonly name = "RenderFailureError";
}

/**
 * Turns whatever a rejected render produced into a status message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
