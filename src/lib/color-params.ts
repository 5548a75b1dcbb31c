// ABOUTME: Zoom-adaptive color banding plus the named color presets and themes
// ABOUTME: Presets pin every banding field; without one the zoom depth decides

import type { ColorParams, RgbThetas } from "../fractals/types";

export type BandingParams = Pick<ColorParams, "stripeDensity" | "cycleDensity">;

/**
 * Step function of the zoom depth: deeper views get denser stripes and more
 * color cycles so the structure keeps its contrast.
 */
export function adjustColorParameters(zoomLevel: number): BandingParams {
  if (zoomLevel < 10) return { stripeDensity: 16, cycleDensity: 32 };
  if (zoomLevel < 100) return { stripeDensity: 20, cycleDensity: 48 };
  if (zoomLevel < 1000) return { stripeDensity: 24, cycleDensity: 64 };
  return { stripeDensity: 32, cycleDensity: 96 };
}

export const colorThemes = {
  Classic: [0.0, 0.15, 0.25],
  Fire: [0.0, 0.05, 0.1],
  Ocean: [0.4, 0.6, 0.8],
  Forest: [0.2, 0.4, 0.1],
  Purple: [0.7, 0.3, 0.9],
  Sunset: [0.0, 0.3, 0.6],
  Electric: [0.2, 0.7, 0.9],
  Copper: [0.1, 0.05, 0.0],
} satisfies Record<string, RgbThetas>;

export type ColorThemeName = keyof typeof colorThemes;

export const colorPresets = {
  "Filigree Detail": {
    rgbThetas: [0.0, 0.15, 0.25],
    cycleDensity: 32,
    stripeDensity: 16,
    stripeSigma: 0.9,
    stepDensity: 8,
  },
  "Deep Structure": {
    rgbThetas: [0.7, 0.3, 0.9],
    cycleDensity: 64,
    stripeDensity: 24,
    stripeSigma: 0.85,
    stepDensity: 12,
  },
  "Fine Detail": {
    rgbThetas: [0.2, 0.7, 0.9],
    cycleDensity: 48,
    stripeDensity: 12,
    stripeSigma: 0.95,
    stepDensity: 4,
  },
  "Rich Boundaries": {
    rgbThetas: [0.0, 0.3, 0.6],
    cycleDensity: 56,
    stripeDensity: 20,
    stripeSigma: 0.88,
    stepDensity: 10,
  },
} satisfies Record<string, ColorParams>;

export type ColorPresetName = keyof typeof colorPresets;

export const isColorThemeName = (name: string): name is ColorThemeName => Object.hasOwn(colorThemes, name);

export const isColorPresetName = (name: string): name is ColorPresetName => Object.hasOwn(colorPresets, name);

export const defaultColorParams: ColorParams = {
  ...adjustColorParameters(1),
  stripeSigma: 0.9,
  stepDensity: 0,
  rgbThetas: [...colorThemes.Classic],
};

/**
 * Color parameters for a frame at `zoomLevel`. A selected preset sticks until
 * it is cleared; otherwise the banding follows the zoom depth and the remaining
 * fields are carried over from `current`.
 */
export function resolveColorParams(
  current: ColorParams,
  zoomLevel: number,
  preset: ColorPresetName | null
): ColorParams {
  if (preset !== null) {
    const pinned = colorPresets[preset];
    return { ...pinned, rgbThetas: [...pinned.rgbThetas] };
  }
  return { ...current, ...adjustColorParameters(zoomLevel) };
}
