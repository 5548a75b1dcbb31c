// ABOUTME: Shared data model for viewports, render requests and render results
// ABOUTME: Everything that crosses the worker boundary is plain, cloneable data

export type Bounds = {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
};

export type RgbThetas = [number, number, number];

// --- Color parameters ---
// stripeDensity/cycleDensity follow the zoom depth unless a preset is pinned
export type ColorParams = {
  stripeDensity: number;
  cycleDensity: number;
  stripeSigma: number;
  stepDensity: number;
  rgbThetas: RgbThetas;
};

export type Oversampling = 1 | 2 | 3;

export type Viewport = {
  pixelWidth: number;
  pixelHeight: number;
  bounds: Bounds;
  zoomLevel: number;
  maxIterations: number;
  colorParams: ColorParams;
  oversampling: Oversampling;
};

/**
 * Immutable snapshot handed to a render engine. The generation is assigned by
 * the scheduler at dispatch time and never reused.
 */
export type RenderRequest = Readonly<{
  generation: number;
  viewport: Readonly<Viewport>;
}>;

/**
 * RGB pixel data, 3 bytes per pixel, row 0 at the top of the image.
 */
export interface PixelBuffer {
  width: number;
  height: number;
  bytes: Uint8Array;
}

export type PrecisionInfo = {
  decimalDigitsNeeded: number;
  warning: boolean;
  percentOfBudget: number;
  maxDigits: number;
};

export type RenderSuccess = {
  ok: true;
  generation: number;
  buffer: PixelBuffer;
  precision: PrecisionInfo;
  durationMs: number;
};

export type RenderFailure = {
  ok: false;
  generation: number;
  error: string;
};

export type RenderResult = RenderSuccess | RenderFailure;
