// ABOUTME: Tests for debounced, single-flight render scheduling
// ABOUTME: Uses fake timers and an engine whose renders settle only when the test says so

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { defaultColorParams } from "../../lib/color-params";
import type { PixelBuffer, RenderRequest, RenderResult, Viewport } from "../types";
import type { RenderEngine } from "./engine";
import { RenderScheduler, type RenderStatus, type RenderSchedulerOptions } from "./scheduler";

interface PendingRender {
  request: RenderRequest;
  signal?: AbortSignal;
  resolve: (buffer: PixelBuffer) => void;
  reject: (error: unknown) => void;
}

class DeferredEngine implements RenderEngine {
  readonly renders: PendingRender[] = [];

  render(request: RenderRequest, signal?: AbortSignal): Promise<PixelBuffer> {
    return new Promise<PixelBuffer>((resolve, reject) => {
      this.renders.push({ request, signal, resolve, reject });
    });
  }
}

const viewportAt = (zoomLevel: number): Viewport => ({
  pixelWidth: 8,
  pixelHeight: 6,
  bounds: { xmin: -2 / zoomLevel, xmax: 2 / zoomLevel, ymin: -1.5 / zoomLevel, ymax: 1.5 / zoomLevel },
  zoomLevel,
  maxIterations: 500,
  colorParams: { ...defaultColorParams, rgbThetas: [...defaultColorParams.rgbThetas] },
  oversampling: 1,
});

const bufferFor = (request: RenderRequest): PixelBuffer => ({
  width: request.viewport.pixelWidth,
  height: request.viewport.pixelHeight,
  bytes: new Uint8Array(request.viewport.pixelWidth * request.viewport.pixelHeight * 3),
});

// Lets settled engine promises reach the scheduler
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("RenderScheduler", () => {
  let engine: DeferredEngine;
  let results: RenderResult[];
  let statuses: RenderStatus[];

  const createScheduler = (options: Partial<RenderSchedulerOptions> = {}) =>
    new RenderScheduler(engine, {
      debounceMs: 100,
      renderTimeoutMs: 0,
      onResult: (result) => results.push(result),
      onStatus: (status) => statuses.push(status),
      ...options,
    });

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    engine = new DeferredEngine();
    results = [];
    statuses = [];
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("debouncing", () => {
    it("should collapse a burst into one dispatch of the last snapshot", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(30);
      scheduler.requestRender(viewportAt(2));
      await vi.advanceTimersByTimeAsync(30);
      scheduler.requestRender(viewportAt(3));
      expect(scheduler.getState()).toBe("debouncing");

      await vi.advanceTimersByTimeAsync(99);
      expect(engine.renders).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(engine.renders).toHaveLength(1);
      expect(engine.renders[0].request.generation).toBe(1);
      expect(engine.renders[0].request.viewport.zoomLevel).toBe(3);
      expect(scheduler.getState()).toBe("rendering");
    });

    it("should freeze the snapshot at request time", async () => {
      const scheduler = createScheduler();
      const viewport = viewportAt(1);

      scheduler.requestRender(viewport);
      viewport.bounds.xmin = 99;
      viewport.colorParams.rgbThetas[0] = 0.5;
      await vi.advanceTimersByTimeAsync(100);

      const dispatched = engine.renders[0].request.viewport;
      expect(dispatched.bounds.xmin).toBe(-2);
      expect(dispatched.colorParams.rgbThetas[0]).toBe(0);
      expect(Object.isFrozen(dispatched)).toBe(true);
      expect(Object.isFrozen(dispatched.bounds)).toBe(true);
    });
  });

  describe("single flight", () => {
    it("should dispatch exactly one follow-up with the latest snapshot", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);

      scheduler.requestRender(viewportAt(2));
      scheduler.requestRender(viewportAt(3));
      expect(scheduler.getState()).toBe("renderingWithPending");

      await vi.advanceTimersByTimeAsync(1000);
      expect(engine.renders).toHaveLength(1);

      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();

      expect(engine.renders).toHaveLength(2);
      expect(engine.renders[1].request.generation).toBe(2);
      expect(engine.renders[1].request.viewport.zoomLevel).toBe(3);
      expect(scheduler.getState()).toBe("rendering");

      engine.renders[1].resolve(bufferFor(engine.renders[1].request));
      await flush();

      expect(engine.renders).toHaveLength(2);
      expect(results.map((result) => result.generation)).toEqual([1, 2]);
      expect(scheduler.getState()).toBe("idle");
    });

    it("should restart the debounce window on every request", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(50);
      scheduler.requestRender(viewportAt(2));
      await vi.advanceTimersByTimeAsync(99);
      expect(engine.renders).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(engine.renders).toHaveLength(1);
      expect(engine.renders[0].request.viewport.zoomLevel).toBe(2);
    });

    it("should publish a success with precision info and go idle", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();

      expect(results).toHaveLength(1);
      const [result] = results;
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.buffer.width).toBe(8);
        expect(result.precision.decimalDigitsNeeded).toBe(2);
        expect(result.durationMs).toBeGreaterThanOrEqual(0);
      }
      expect(statuses).toEqual([
        { kind: "rendering", generation: 1 },
        { kind: "ready", generation: 1 },
      ]);
      expect(scheduler.getState()).toBe("idle");
    });

    it("should assign strictly increasing generations", async () => {
      const scheduler = createScheduler();

      for (let zoom = 1; zoom <= 3; zoom++) {
        scheduler.requestRender(viewportAt(zoom));
        await vi.advanceTimersByTimeAsync(100);
        const render = engine.renders[engine.renders.length - 1];
        render.resolve(bufferFor(render.request));
        await flush();
      }

      expect(engine.renders.map((render) => render.request.generation)).toEqual([1, 2, 3]);
      expect(scheduler.getGeneration()).toBe(3);
    });
  });

  describe("failures", () => {
    it("should publish the error and still dispatch the pending snapshot", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      scheduler.requestRender(viewportAt(2));

      engine.renders[0].reject(new Error("engine exploded"));
      await flush();

      expect(results).toEqual([{ ok: false, generation: 1, error: "engine exploded" }]);
      expect(statuses).toContainEqual({ kind: "error", generation: 1, message: "engine exploded" });
      expect(engine.renders).toHaveLength(2);
      expect(engine.renders[1].request.viewport.zoomLevel).toBe(2);
      expect(scheduler.getPerformanceMonitor().getStats().failedRenders).toBe(1);
    });

    it("should keep going when the result listener throws", async () => {
      const scheduler = createScheduler({
        onResult: () => {
          throw new Error("listener failed");
        },
      });

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      scheduler.requestRender(viewportAt(2));
      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();

      expect(engine.renders).toHaveLength(2);
      expect(statuses).toContainEqual({ kind: "ready", generation: 1 });
    });

    it("should keep dispatching when the status listener throws", async () => {
      const scheduler = createScheduler({
        onStatus: () => {
          throw new Error("status listener failed");
        },
      });

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      expect(engine.renders).toHaveLength(1);

      scheduler.requestRender(viewportAt(2));
      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();

      expect(engine.renders).toHaveLength(2);
      expect(engine.renders[1].request.viewport.zoomLevel).toBe(2);

      engine.renders[1].resolve(bufferFor(engine.renders[1].request));
      await flush();

      expect(results.map((result) => result.generation)).toEqual([1, 2]);
      expect(scheduler.getState()).toBe("idle");
      expect(console.error).toHaveBeenCalledWith("Status listener failed for render 1:", expect.any(Error));
    });
  });

  describe("timeouts", () => {
    it("should abandon a stuck render and drop its late result", async () => {
      const scheduler = createScheduler({ renderTimeoutMs: 1000 });

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      await vi.advanceTimersByTimeAsync(1000);

      expect(results).toEqual([{ ok: false, generation: 1, error: "Render timed out after 1000 ms" }]);
      expect(engine.renders[0].signal?.aborted).toBe(true);
      expect(scheduler.getState()).toBe("idle");

      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();

      expect(results).toHaveLength(1);
    });

    it("should dispatch the pending snapshot after a timeout", async () => {
      const scheduler = createScheduler({ renderTimeoutMs: 1000 });

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      scheduler.requestRender(viewportAt(2));
      await vi.advanceTimersByTimeAsync(1000);

      expect(engine.renders).toHaveLength(2);
      expect(engine.renders[1].request.generation).toBe(2);

      // The abandoned render finishing late must not complete generation 2
      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();

      expect(results.map((result) => result.generation)).toEqual([1]);
      expect(scheduler.getState()).toBe("rendering");
    });

    it("should not time out a render that finishes in time", async () => {
      const scheduler = createScheduler({ renderTimeoutMs: 1000 });

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();
      await vi.advanceTimersByTimeAsync(2000);

      expect(results).toHaveLength(1);
      expect(results[0].ok).toBe(true);
    });
  });

  describe("dispose", () => {
    it("should cancel the debounce timer", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      scheduler.dispose();
      await vi.advanceTimersByTimeAsync(200);

      expect(engine.renders).toHaveLength(0);
      expect(scheduler.getState()).toBe("idle");
    });

    it("should abort the running render and publish nothing afterwards", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      scheduler.requestRender(viewportAt(2));
      scheduler.dispose();

      expect(engine.renders[0].signal?.aborted).toBe(true);

      engine.renders[0].resolve(bufferFor(engine.renders[0].request));
      await flush();
      scheduler.requestRender(viewportAt(3));
      await vi.advanceTimersByTimeAsync(200);

      expect(results).toEqual([]);
      expect(engine.renders).toHaveLength(1);
    });

    it("should close the monitor session of the aborted render", async () => {
      const scheduler = createScheduler();

      scheduler.requestRender(viewportAt(1));
      await vi.advanceTimersByTimeAsync(100);
      scheduler.dispose();

      const monitor = scheduler.getPerformanceMonitor();
      expect(monitor.getStats()).toMatchObject({ totalRenders: 1, failedRenders: 1 });
      expect(monitor.getLastRenderMetrics()?.generation).toBe(1);
    });
  });
});
