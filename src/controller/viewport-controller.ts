// ABOUTME: Session controller that turns input events into viewport updates and render requests
// ABOUTME: Owns the store, the history stack and the scheduler of one explorer session

import {
  assertIterationBudget,
  isOversampling,
  isRenderQuality,
  qualityScale,
  resolveExplorerConfig,
  type ExplorerConfig,
} from "../config";
import { PpmExporter, type ImageExporter } from "../export/ppm";
import type { RenderEngine } from "../fractals/render/engine";
import { RenderScheduler, type RenderStatus, type SchedulerState } from "../fractals/render/scheduler";
import type { PixelBuffer, RenderResult, Viewport } from "../fractals/types";
import { colorThemes, isColorPresetName, isColorThemeName, resolveColorParams } from "../lib/color-params";
import { assertValidViewport, fitAspectRatio, pixelToComplex } from "../lib/coordinates";
import { InvalidViewportError, OutOfBoundsError } from "../lib/errors";
import { HistoryStack } from "../lib/history";
import { estimateIterations } from "../lib/iterations";
import type { PerformanceMonitor } from "../lib/performance-monitor";
import { panBy, zoomAt } from "../lib/zoom";
import { createViewportStore, type ViewportStore, type ViewportStoreState } from "../state/viewport-store";

// Values arrive from the UI unchecked, so the option-like fields are plain strings and numbers
export type ParameterChange =
  | { field: "baseIterations"; value: number }
  | { field: "iterationCap"; value: number }
  | { field: "dynamicIterations"; value: boolean }
  | { field: "oversampling"; value: number }
  | { field: "quality"; value: string }
  | { field: "colorPreset"; value: string | null }
  | { field: "colorTheme"; value: string }
  | { field: "stripeDensity"; value: number }
  | { field: "cycleDensity"; value: number };

export type InputEvent =
  | { type: "pan"; dx: number; dy: number }
  | { type: "zoomAt"; x: number; y: number; factor: number }
  | { type: "resize"; width: number; height: number }
  | ({ type: "parameterChange" } & ParameterChange)
  | { type: "resetHome" };

export interface DisplaySurface {
  show(buffer: PixelBuffer): void;
}

export interface ViewportControllerOptions {
  engine: RenderEngine;
  display: DisplaySurface;
  config?: Partial<ExplorerConfig>;
  exporter?: ImageExporter;
  monitor?: PerformanceMonitor;
}

type Settings = Pick<
  ViewportStoreState,
  "baseIterations" | "iterationCap" | "dynamicIterations" | "quality" | "colorPreset"
>;

// What an event would change; nothing is committed until the whole transition is valid
type Transition = {
  viewport: Viewport;
  settings?: Partial<Settings>;
  recordHistory: boolean;
};

const pickSettings = (state: ViewportStoreState): Settings => ({
  baseIterations: state.baseIterations,
  iterationCap: state.iterationCap,
  dynamicIterations: state.dynamicIterations,
  quality: state.quality,
  colorPreset: state.colorPreset,
});

/**
 * ViewportController is the single writer of a session's viewport.
 *
 * - Navigation (pan, zoom, reset) records the previous bounds in the history
 *   stack before the new viewport is committed.
 * - Rejected events leave the store and history untouched and request nothing.
 * - Every accepted event ends with one `requestRender`; the scheduler decides
 *   when a frame is actually computed.
 *
 * Usage:
 * ```typescript
 * const controller = new ViewportController({ engine: new WorkerRenderEngine(), display });
 * controller.start();
 * controller.handle({ type: "zoomAt", x: 400, y: 300, factor: 0.25 });
 * ```
 */
export class ViewportController {
  readonly config: ExplorerConfig;
  readonly store: ViewportStore;
  readonly history: HistoryStack;

  private readonly scheduler: RenderScheduler;
  private readonly display: DisplaySurface;
  private readonly exporter: ImageExporter;
  private lastBuffer: PixelBuffer | null = null;

  constructor(options: ViewportControllerOptions) {
    this.config = resolveExplorerConfig(options.config);
    this.store = createViewportStore(this.config);
    this.history = new HistoryStack(this.config.historyCapacity);
    this.display = options.display;
    this.exporter = options.exporter ?? new PpmExporter();
    this.scheduler = new RenderScheduler(options.engine, {
      debounceMs: this.config.debounceMs,
      renderTimeoutMs: this.config.renderTimeoutMs,
      monitor: options.monitor,
      onResult: (result) => this.applyResult(result),
      onStatus: (status) => this.applyStatus(status),
    });
  }

  /** Requests the first frame of the session. */
  start(): void {
    this.requestRender();
  }

  /**
   * Applies one input event.
   *
   * @returns false when the event was rejected and nothing changed
   */
  handle(event: InputEvent): boolean {
    const state = this.store.getState();

    let transition: Transition;
    try {
      transition = this.transition(event, state);
      assertValidViewport(transition.viewport);
    } catch (error) {
      if (error instanceof InvalidViewportError || error instanceof OutOfBoundsError) {
        console.warn(`Ignoring ${event.type} event: ${error.message}`);
        return false;
      }
      throw error;
    }

    if (transition.recordHistory) {
      this.history.push(state.viewport.bounds);
    }
    if (transition.settings) {
      state.setSettings(transition.settings);
    }
    state.setViewport(transition.viewport);

    this.requestRender();
    return true;
  }

  getViewport(): Viewport {
    return this.store.getState().viewport;
  }

  getSchedulerState(): SchedulerState {
    return this.scheduler.getState();
  }

  getPerformanceMonitor(): PerformanceMonitor {
    return this.scheduler.getPerformanceMonitor();
  }

  /**
   * Writes the last displayed frame to `destination`.
   *
   * @throws Error if no frame has been displayed yet
   */
  async exportCurrent(destination: string): Promise<void> {
    if (!this.lastBuffer) {
      throw new Error("Nothing has been rendered yet");
    }
    await this.exporter.exportImage(this.lastBuffer, destination);
  }

  dispose(): void {
    this.scheduler.dispose();
  }

  private transition(event: InputEvent, state: ViewportStoreState): Transition {
    const current = state.viewport;
    const settings = pickSettings(state);

    switch (event.type) {
      case "pan":
        return { viewport: panBy(current, event.dx, event.dy), recordHistory: true };

      case "zoomAt": {
        const target = pixelToComplex(event.x, event.y, current);
        const zoomed = zoomAt(current, target.re, target.im, event.factor);
        const fitted = fitAspectRatio(zoomed, current.pixelWidth, current.pixelHeight);
        return { viewport: this.refreshDerived(fitted, settings), recordHistory: true };
      }

      case "resize":
        return { viewport: fitAspectRatio(current, event.width, event.height), recordHistory: false };

      case "parameterChange":
        return this.applyParameter(event, current, settings);

      case "resetHome": {
        const home = fitAspectRatio(
          { ...current, bounds: { ...this.config.homeBounds }, zoomLevel: 1 },
          current.pixelWidth,
          current.pixelHeight
        );
        return { viewport: this.refreshDerived(home, settings), recordHistory: true };
      }
    }
  }

  private applyParameter(change: ParameterChange, current: Viewport, settings: Settings): Transition {
    const update = (patch: Partial<Settings>): Transition => ({
      viewport: this.refreshDerived(current, { ...settings, ...patch }),
      settings: patch,
      recordHistory: false,
    });

    switch (change.field) {
      case "baseIterations":
        assertIterationBudget(change.value, settings.iterationCap);
        return update({ baseIterations: change.value });

      case "iterationCap":
        assertIterationBudget(settings.baseIterations, change.value);
        return update({ iterationCap: change.value });

      case "dynamicIterations":
        return update({ dynamicIterations: change.value });

      case "quality":
        if (!isRenderQuality(change.value)) {
          throw new InvalidViewportError(`Unknown render quality "${change.value}"`);
        }
        return update({ quality: change.value });

      case "colorPreset":
        if (change.value !== null && !isColorPresetName(change.value)) {
          throw new InvalidViewportError(`Unknown color preset "${change.value}"`);
        }
        return update({ colorPreset: change.value });

      case "oversampling":
        if (!isOversampling(change.value)) {
          throw new InvalidViewportError(`Oversampling must be 1, 2 or 3, got ${change.value}`);
        }
        return { viewport: { ...current, oversampling: change.value }, recordHistory: false };

      // Manual color edits unpin the preset
      case "colorTheme": {
        if (!isColorThemeName(change.value)) {
          throw new InvalidViewportError(`Unknown color theme "${change.value}"`);
        }
        const themed: Viewport = { ...current, colorParams: { ...current.colorParams, rgbThetas: [...colorThemes[change.value]] } };
        return {
          viewport: this.refreshDerived(themed, { ...settings, colorPreset: null }),
          settings: { colorPreset: null },
          recordHistory: false,
        };
      }

      case "stripeDensity":
        if (!Number.isFinite(change.value) || change.value < 0) {
          throw new InvalidViewportError(`Stripe density must be non-negative, got ${change.value}`);
        }
        return {
          viewport: { ...current, colorParams: { ...current.colorParams, stripeDensity: change.value } },
          settings: { colorPreset: null },
          recordHistory: false,
        };

      case "cycleDensity":
        if (!Number.isFinite(change.value) || change.value <= 0) {
          throw new InvalidViewportError(`Cycle density must be positive, got ${change.value}`);
        }
        return {
          viewport: { ...current, colorParams: { ...current.colorParams, cycleDensity: change.value } },
          settings: { colorPreset: null },
          recordHistory: false,
        };
    }
  }

  // Iteration budget and color banding both follow the zoom depth
  private refreshDerived(viewport: Viewport, settings: Settings): Viewport {
    const budget = settings.dynamicIterations
      ? estimateIterations(viewport.zoomLevel, settings.baseIterations, settings.iterationCap)
      : settings.baseIterations;

    return {
      ...viewport,
      maxIterations: Math.min(budget, settings.iterationCap),
      colorParams: resolveColorParams(viewport.colorParams, viewport.zoomLevel, settings.colorPreset),
    };
  }

  // Snapshots carry the render size; the bounds stay those of the surface
  private requestRender(): void {
    const { viewport, quality } = this.store.getState();
    const scale = qualityScale[quality];

    this.scheduler.requestRender({
      ...viewport,
      pixelWidth: Math.max(1, Math.round(viewport.pixelWidth * scale)),
      pixelHeight: Math.max(1, Math.round(viewport.pixelHeight * scale)),
    });
  }

  private applyResult(result: RenderResult): void {
    if (!result.ok) {
      return;
    }

    this.lastBuffer = result.buffer;
    this.display.show(result.buffer);
    this.store.getState().recordRender(result.generation, result.precision, result.durationMs);

    if (result.precision.warning) {
      console.warn(
        `Zoom needs ~${result.precision.decimalDigitsNeeded} significant digits, ` +
          `float64 resolves ${result.precision.maxDigits}; expect pixelation`
      );
    }
  }

  private applyStatus(status: RenderStatus): void {
    const { setStatus } = this.store.getState();

    switch (status.kind) {
      case "rendering":
        setStatus({ kind: "rendering", message: "Computing..." });
        break;
      case "ready":
        setStatus({ kind: "ready", message: "Ready" });
        break;
      case "error":
        setStatus({ kind: "error", message: `Error: ${status.message}` });
        break;
    }
  }
}
