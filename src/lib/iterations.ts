import type { PrecisionInfo } from "../fractals/types";

export const DEFAULT_ITERATION_CAP = 50000;

// 64-bit floats carry roughly 15 significant decimal digits
export const FLOAT64_DECIMAL_DIGITS = 15;
const PRECISION_WARNING_RATIO = 0.8;

/**
 * Derives the iteration budget for a zoom depth.
 *
 * At or below zoom 1 the base budget is used unchanged. Deeper in, the budget
 * grows logarithmically: `floor(base * log10(zoom + 1) + base)`, never above `cap`.
 */
export const estimateIterations = (
  zoomLevel: number,
  baseIterations: number,
  cap: number = DEFAULT_ITERATION_CAP
): number => {
  if (zoomLevel <= 1.0) {
    return baseIterations;
  }

  const estimated = Math.floor(baseIterations * Math.log10(zoomLevel + 1) + baseIterations);
  return Math.min(estimated, cap);
};

/**
 * Estimates how many decimal digits the current zoom needs and flags when that
 * approaches what a 64-bit float can resolve. Purely advisory.
 */
export const getPrecisionInfo = (zoomLevel: number): PrecisionInfo => {
  const safeZoom = Math.max(zoomLevel, 1.0);
  const decimalDigitsNeeded = Math.max(1, Math.floor(Math.log10(safeZoom)) + 2);

  return {
    decimalDigitsNeeded,
    warning: decimalDigitsNeeded > FLOAT64_DECIMAL_DIGITS * PRECISION_WARNING_RATIO,
    percentOfBudget: Math.min(100, (decimalDigitsNeeded / FLOAT64_DECIMAL_DIGITS) * 100),
    maxDigits: FLOAT64_DECIMAL_DIGITS,
  };
};
