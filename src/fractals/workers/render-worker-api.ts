// ABOUTME: API a render worker exposes to the control thread through Comlink
// ABOUTME: Kept apart from the worker entry so it can be exposed on any port

import type { PixelBuffer, RenderRequest } from "../types";
import { computeFrame } from "../render/frame";

export const renderWorkerAPI = {
  /**
   * Computes the frame described by the request. The request arrives as a
   * structured-clone copy; the buffer goes back the same way.
   */
  renderFrame: (request: RenderRequest): PixelBuffer => {
    return computeFrame(request.viewport);
  },

  /**
   * Simple ping method for testing worker connectivity.
   * @returns "pong" string
   */
  ping: () => "pong" as const,
};

export type RenderWorkerAPI = typeof renderWorkerAPI;
