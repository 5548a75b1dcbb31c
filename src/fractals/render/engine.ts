import { setImmediate as yieldToEventLoop } from "node:timers/promises";

import type { PixelBuffer, RenderRequest } from "../types";
import { computeRow, createPixelBuffer } from "./frame";

/**
 * A render engine turns an immutable request into a pixel buffer. It must not
 * mutate the request, and a rejected promise is reported as a render failure.
 */
export interface RenderEngine {
  render(request: RenderRequest, signal?: AbortSignal): Promise<PixelBuffer>;
}

/**
 * Computes frames on the calling thread. Suited to tests and small surfaces;
 * interactive sessions use the WorkerRenderEngine.
 *
 * The event loop gets a turn after every row, so timers and an abort signal
 * can stop a frame part way through.
 */
export class LocalRenderEngine implements RenderEngine {
  async render(request: RenderRequest, signal?: AbortSignal): Promise<PixelBuffer> {
    const buffer = createPixelBuffer(request.viewport);

    for (let y = 0; y < buffer.height; y++) {
      signal?.throwIfAborted();
      computeRow(request.viewport, y, buffer.bytes);
      await yieldToEventLoop();
    }

    return buffer;
  }
}
