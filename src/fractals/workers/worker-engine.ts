// ABOUTME: Render engine that runs each frame on a worker thread via Comlink RPC
// ABOUTME: An aborted render or a crashed worker is discarded so the next frame gets a fresh thread

import * as Comlink from "comlink";
import path from "node:path";
import { Worker, type WorkerOptions } from "node:worker_threads";

import { describeError, RenderFailureError } from "../../lib/errors";
import type { RenderEngine } from "../render/engine";
import type { PixelBuffer, RenderRequest } from "../types";
import { nodeEndpoint } from "./node-endpoint";
import type { RenderWorkerAPI } from "./render-worker-api";

export interface RenderWorkerHandle {
  api: Comlink.Remote<RenderWorkerAPI>;
  /**
   * Registers a listener for the worker crashing or exiting on its own. A
   * listener added after the worker died is called at once. Returns a function
   * that removes the listener.
   */
  onFailure(listener: (error: Error) => void): () => void;
  terminate(): void;
}

export type SpawnRenderWorker = () => RenderWorkerHandle;

/**
 * Starts the compiled render.worker.js next to this module on a new thread.
 */
export function spawnThreadWorker(
  filename: string = path.join(__dirname, "render.worker.js"),
  options?: WorkerOptions
): RenderWorkerHandle {
  const worker = new Worker(filename, options);
  const { threadId } = worker;
  const api = Comlink.wrap<RenderWorkerAPI>(nodeEndpoint(worker));
  const listeners = new Set<(error: Error) => void>();
  let failure: Error | null = null;
  let terminated = false;

  const fail = (error: Error) => {
    if (failure || terminated) {
      return;
    }
    failure = error;
    for (const listener of [...listeners]) {
      listener(error);
    }
    listeners.clear();
  };

  worker.on("error", (error: Error) => {
    console.error(`Render worker ${threadId} crashed:`, error);
    fail(error);
  });
  worker.on("exit", (exitCode: number) => {
    fail(new Error(`Render worker ${threadId} exited with code ${exitCode}`));
  });
  console.log(`Render worker ${threadId} started`);

  return {
    api,
    onFailure: (listener) => {
      if (failure) {
        listener(failure);
        return () => {};
      }
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
    terminate: () => {
      if (terminated) {
        return;
      }
      terminated = true;
      listeners.clear();
      api[Comlink.releaseProxy]();
      void worker.terminate();
      console.log(`Render worker ${threadId} terminated`);
    },
  };
}

/**
 * WorkerRenderEngine forwards every render to a single worker. The control
 * thread only ever sees the cloned result, so nothing mutable crosses threads.
 *
 * Usage:
 * ```typescript
 * const engine = new WorkerRenderEngine();
 * await engine.init();
 * const buffer = await engine.render(request, abortController.signal);
 * engine.terminate();
 * ```
 */
export class WorkerRenderEngine implements RenderEngine {
  private handle: RenderWorkerHandle | null = null;

  constructor(private readonly spawn: SpawnRenderWorker = spawnThreadWorker) {}

  /**
   * Starts the worker ahead of the first render and checks it answers.
   */
  async init(): Promise<void> {
    const handle = this.acquire();
    const response = await this.call(handle, () => handle.api.ping());
    if (response !== "pong") {
      throw new Error("Render worker failed to respond to ping");
    }
  }

  async render(request: RenderRequest, signal?: AbortSignal): Promise<PixelBuffer> {
    if (signal?.aborted) {
      throw new RenderFailureError("Render cancelled before starting");
    }

    const handle = this.acquire();

    try {
      return await this.call(handle, () => handle.api.renderFrame(request), signal);
    } catch (error) {
      if (error instanceof RenderFailureError) {
        throw error;
      }
      console.error(`Worker failed to render generation ${request.generation}:`, error);
      throw new RenderFailureError(describeError(error));
    }
  }

  /**
   * Terminates the worker. A later render starts a fresh one.
   */
  terminate(): void {
    if (this.handle) {
      this.discard(this.handle);
    }
  }

  /**
   * Runs one RPC on `handle`. Aborting the signal or losing the worker settles
   * the call with a RenderFailureError and discards the worker, which may still
   * be busy or already gone.
   */
  private call<T>(handle: RenderWorkerHandle, start: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let removeFailureListener = () => {};

      const settle = () => {
        signal?.removeEventListener("abort", onAbort);
        removeFailureListener();
      };
      const onAbort = () => {
        settle();
        this.discard(handle);
        reject(new RenderFailureError("Render cancelled"));
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      void start().then(
        (value) => {
          settle();
          resolve(value);
        },
        (error: unknown) => {
          settle();
          reject(error);
        }
      );

      removeFailureListener = handle.onFailure((error) => {
        settle();
        this.discard(handle);
        reject(new RenderFailureError(`Render worker died: ${error.message}`));
      });
    });
  }

  private acquire(): RenderWorkerHandle {
    if (!this.handle) {
      this.handle = this.spawn();
    }
    return this.handle;
  }

  private discard(handle: RenderWorkerHandle): void {
    handle.terminate();
    if (this.handle === handle) {
      this.handle = null;
    }
  }
}
