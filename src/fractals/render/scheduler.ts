// ABOUTME: Debounced, single-flight render scheduling for one viewport session
// ABOUTME: Bursts collapse to the latest snapshot and results are published in dispatch order

import debounce, { type Debounced } from "../../lib/debounce";
import { describeError } from "../../lib/errors";
import { getPrecisionInfo } from "../../lib/iterations";
import { PerformanceMonitor } from "../../lib/performance-monitor";
import type { PixelBuffer, RenderRequest, RenderResult, RgbThetas, Viewport } from "../types";
import type { RenderEngine } from "./engine";

export const DEFAULT_DEBOUNCE_MS = 100;
export const DEFAULT_RENDER_TIMEOUT_MS = 30000;

/**
 * idle → debouncing → rendering ⇄ renderingWithPending → idle.
 * A request that arrives while rendering skips the timer and becomes the
 * pending snapshot, replacing any earlier one.
 */
export type SchedulerState = "idle" | "debouncing" | "rendering" | "renderingWithPending";

export type RenderStatus =
  | { kind: "rendering"; generation: number }
  | { kind: "ready"; generation: number }
  | { kind: "error"; generation: number; message: string };

export interface RenderSchedulerOptions {
  /** Called on the control loop with every published result, in dispatch order */
  onResult: (result: RenderResult) => void;
  onStatus?: (status: RenderStatus) => void;
  debounceMs?: number;
  /** A render running longer than this is abandoned. 0 disables the timeout. */
  renderTimeoutMs?: number;
  monitor?: PerformanceMonitor;
}

interface InFlightRender {
  generation: number;
  controller: AbortController;
  timeout: ReturnType<typeof setTimeout> | null;
}

type Completion = { ok: true; buffer: PixelBuffer } | { ok: false; error: string };

/**
 * Copies a viewport into a frozen snapshot; later mutations of the caller's
 * viewport cannot reach a queued or running render.
 */
export function freezeViewport(viewport: Readonly<Viewport>): Readonly<Viewport> {
  const rgbThetas: RgbThetas = [...viewport.colorParams.rgbThetas];
  Object.freeze(rgbThetas);

  return Object.freeze({
    ...viewport,
    bounds: Object.freeze({ ...viewport.bounds }),
    colorParams: Object.freeze({ ...viewport.colorParams, rgbThetas }),
  });
}

/**
 * RenderScheduler turns a stream of viewport snapshots into at most one
 * running render.
 *
 * - `requestRender` never blocks. Requests within the debounce window reset
 *   the timer and replace the stored snapshot.
 * - Only one render executes at a time. Requests made meanwhile collapse into a
 *   single pending snapshot that is dispatched as soon as the render settles.
 * - Every dispatch gets a new generation; results are published in order, so
 *   the last published frame matches the last request once input stops.
 * - Failures are published as errors and never retried.
 *
 * Usage:
 * ```typescript
 * const scheduler = new RenderScheduler(new WorkerRenderEngine(), {
 *   onResult: (result) => (result.ok ? display.show(result.buffer) : showError(result.error)),
 * });
 * scheduler.requestRender(viewport);
 * ```
 */
export class RenderScheduler {
  private state: SchedulerState = "idle";
  private generation = 0;
  private inFlight: InFlightRender | null = null;
  private pending: Readonly<Viewport> | null = null;
  private disposed = false;

  private readonly onResult: (result: RenderResult) => void;
  private readonly onStatus: (status: RenderStatus) => void;
  private readonly renderTimeoutMs: number;
  private readonly monitor: PerformanceMonitor;
  private readonly timerFired: Debounced<[Readonly<Viewport>]>;

  constructor(
    private readonly engine: RenderEngine,
    options: RenderSchedulerOptions
  ) {
    this.onResult = options.onResult;
    this.onStatus = options.onStatus ?? (() => {});
    this.renderTimeoutMs = options.renderTimeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS;
    this.monitor = options.monitor ?? new PerformanceMonitor();
    this.timerFired = debounce(
      (snapshot: Readonly<Viewport>) => this.onTimerFired(snapshot),
      options.debounceMs ?? DEFAULT_DEBOUNCE_MS
    );
  }

  requestRender(viewport: Readonly<Viewport>): void {
    if (this.disposed) {
      return;
    }

    const snapshot = freezeViewport(viewport);

    if (this.inFlight) {
      this.pending = snapshot;
      this.state = "renderingWithPending";
      return;
    }

    this.state = "debouncing";
    this.timerFired(snapshot);
  }

  getState(): SchedulerState {
    return this.state;
  }

  /** Generation of the most recent dispatch; 0 before the first one. */
  getGeneration(): number {
    return this.generation;
  }

  getPerformanceMonitor(): PerformanceMonitor {
    return this.monitor;
  }

  /**
   * Stops the scheduler: the debounce timer is cleared, the running render is
   * aborted, and nothing is published afterwards.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.timerFired.cancel();
    this.pending = null;

    if (this.inFlight) {
      const inFlight = this.clearInFlight();
      inFlight.controller.abort();
      this.monitor.endRender(inFlight.generation, "error");
    }
    this.state = "idle";
  }

  private onTimerFired(snapshot: Readonly<Viewport>): void {
    if (this.inFlight) {
      this.pending = snapshot;
      this.state = "renderingWithPending";
      return;
    }
    this.dispatch(snapshot);
  }

  private dispatch(snapshot: Readonly<Viewport>): void {
    const generation = ++this.generation;
    const request: RenderRequest = Object.freeze({ generation, viewport: snapshot });
    const inFlight: InFlightRender = { generation, controller: new AbortController(), timeout: null };

    if (this.renderTimeoutMs > 0) {
      inFlight.timeout = setTimeout(() => this.onTimeout(generation), this.renderTimeoutMs);
    }

    this.inFlight = inFlight;
    this.state = "rendering";
    this.monitor.startRender(generation, snapshot.pixelWidth * snapshot.pixelHeight);

    console.log(
      `Dispatching render ${generation}: ${snapshot.pixelWidth}x${snapshot.pixelHeight}, ` +
        `zoom=${snapshot.zoomLevel}, iterations=${snapshot.maxIterations}`
    );
    this.notify({ kind: "rendering", generation });

    void this.run(request, inFlight.controller.signal);
  }

  private async run(request: RenderRequest, signal: AbortSignal): Promise<void> {
    let completion: Completion;
    try {
      completion = { ok: true, buffer: await this.engine.render(request, signal) };
    } catch (error) {
      completion = { ok: false, error: describeError(error) };
    }
    this.complete(request, completion);
  }

  private complete(request: RenderRequest, completion: Completion): void {
    if (this.disposed) {
      return;
    }
    if (this.inFlight?.generation !== request.generation) {
      console.warn(`Dropping result of abandoned render ${request.generation}`);
      return;
    }

    this.clearInFlight();

    if (completion.ok) {
      const metrics = this.monitor.endRender(request.generation, "ok");
      console.log(
        `Render ${request.generation} complete in ${metrics.duration.toFixed(1)}ms ` +
          `(${metrics.pixelsPerSecond.toFixed(0)} pixels/s)`
      );
      this.publish({
        ok: true,
        generation: request.generation,
        buffer: completion.buffer,
        precision: getPrecisionInfo(request.viewport.zoomLevel),
        durationMs: metrics.duration,
      });
    } else {
      this.monitor.endRender(request.generation, "error");
      console.error(`Render ${request.generation} failed: ${completion.error}`);
      this.publish({ ok: false, generation: request.generation, error: completion.error });
    }

    this.advance();
  }

  private onTimeout(generation: number): void {
    if (this.inFlight?.generation !== generation) {
      return;
    }

    this.clearInFlight().controller.abort();
    this.monitor.endRender(generation, "timeout");

    const error = `Render timed out after ${this.renderTimeoutMs} ms`;
    console.warn(`Render ${generation} abandoned: ${error}`);
    this.publish({ ok: false, generation, error });

    this.advance();
  }

  // Dispatch the pending snapshot, if any, otherwise go idle
  private advance(): void {
    const next = this.pending;
    this.pending = null;

    if (next) {
      this.dispatch(next);
    } else {
      this.state = "idle";
    }
  }

  private clearInFlight(): InFlightRender {
    const inFlight = this.inFlight;
    if (!inFlight) {
      throw new Error("RenderScheduler: no render in flight");
    }
    if (inFlight.timeout) {
      clearTimeout(inFlight.timeout);
    }
    this.inFlight = null;
    return inFlight;
  }

  private publish(result: RenderResult): void {
    try {
      this.onResult(result);
    } catch (error) {
      console.error(`Result listener failed for render ${result.generation}:`, error);
    }

    if (result.ok) {
      this.notify({ kind: "ready", generation: result.generation });
    } else {
      this.notify({ kind: "error", generation: result.generation, message: result.error });
    }
  }

  // A throwing listener must not leave a render marked in flight
  private notify(status: RenderStatus): void {
    try {
      this.onStatus(status);
    } catch (error) {
      console.error(`Status listener failed for render ${status.generation}:`, error);
    }
  }
}
