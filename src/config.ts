import type { Bounds, Oversampling } from "./fractals/types";
import { isValidBounds, isValidPixelSize } from "./lib/coordinates";
import { InvalidViewportError } from "./lib/errors";
import { DEFAULT_HISTORY_CAPACITY } from "./lib/history";
import { DEFAULT_ITERATION_CAP } from "./lib/iterations";

export type RenderQuality = "low" | "normal" | "high";

// Render resolution relative to the display surface
export const qualityScale: Record<RenderQuality, number> = {
  low: 0.5,
  normal: 1,
  high: 1.5,
};

export type ExplorerConfig = {
  homeBounds: Bounds;
  pixelWidth: number;
  pixelHeight: number;
  baseIterations: number;
  iterationCap: number;
  dynamicIterations: boolean;
  oversampling: Oversampling;
  quality: RenderQuality;
  /** Applies to every request source: pan, zoom, resize and parameter changes */
  debounceMs: number;
  /** 0 disables the timeout */
  renderTimeoutMs: number;
  historyCapacity: number;
};

export const defaultExplorerConfig: ExplorerConfig = {
  homeBounds: { xmin: -2.6, xmax: 1.845, ymin: -1.25, ymax: 1.25 },
  pixelWidth: 800,
  pixelHeight: 600,
  baseIterations: 500,
  iterationCap: DEFAULT_ITERATION_CAP,
  dynamicIterations: true,
  oversampling: 1,
  quality: "normal",
  debounceMs: 100,
  renderTimeoutMs: 30000,
  historyCapacity: DEFAULT_HISTORY_CAPACITY,
};

export const isOversampling = (value: number): value is Oversampling => value === 1 || value === 2 || value === 3;

export const isRenderQuality = (value: string): value is RenderQuality => Object.hasOwn(qualityScale, value);

export const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

/**
 * The base budget must be a positive integer no larger than the cap.
 */
export function assertIterationBudget(baseIterations: number, iterationCap: number): void {
  if (!isPositiveInteger(iterationCap)) {
    throw new InvalidViewportError(`Iteration cap must be a positive integer, got ${iterationCap}`);
  }
  if (!isPositiveInteger(baseIterations) || baseIterations > iterationCap) {
    throw new InvalidViewportError(`Base iterations must be an integer in [1, ${iterationCap}], got ${baseIterations}`);
  }
}

/**
 * Merges overrides onto the defaults and rejects combinations no session could start from.
 */
export function resolveExplorerConfig(overrides: Partial<ExplorerConfig> = {}): ExplorerConfig {
  const config: ExplorerConfig = {
    ...defaultExplorerConfig,
    ...overrides,
    homeBounds: { ...(overrides.homeBounds ?? defaultExplorerConfig.homeBounds) },
  };

  if (!isValidBounds(config.homeBounds)) {
    throw new InvalidViewportError("Home bounds must satisfy xmax > xmin and ymax > ymin");
  }
  if (!isValidPixelSize(config.pixelWidth, config.pixelHeight)) {
    throw new InvalidViewportError(`Invalid surface size ${config.pixelWidth}x${config.pixelHeight}`);
  }
  assertIterationBudget(config.baseIterations, config.iterationCap);
  if (!isOversampling(config.oversampling)) {
    throw new InvalidViewportError(`Oversampling must be 1, 2 or 3, got ${config.oversampling}`);
  }
  if (!isRenderQuality(config.quality)) {
    throw new InvalidViewportError(`Unknown render quality "${config.quality}"`);
  }
  if (!(config.debounceMs >= 0) || !(config.renderTimeoutMs >= 0)) {
    throw new InvalidViewportError("Debounce and timeout delays must be non-negative");
  }
  if (!isPositiveInteger(config.historyCapacity)) {
    throw new InvalidViewportError(`History capacity must be a positive integer, got ${config.historyCapacity}`);
  }

  return config;
}
