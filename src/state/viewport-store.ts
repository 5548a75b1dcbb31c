import { createStore } from "zustand/vanilla";

import type { ExplorerConfig, RenderQuality } from "../config";
import { defaultColorParams, type ColorPresetName } from "../lib/color-params";
import { fitAspectRatio } from "../lib/coordinates";
import type { PrecisionInfo, Viewport } from "../fractals/types";

export type RenderStatusState =
  | { kind: "idle"; message: "Ready" }
  | { kind: "rendering"; message: "Computing..." }
  | { kind: "ready"; message: "Ready" }
  | { kind: "error"; message: string };

type State = {
  /** Viewport in surface pixels; this is what coordinate mapping uses */
  viewport: Viewport;
  baseIterations: number;
  iterationCap: number;
  dynamicIterations: boolean;
  quality: RenderQuality;
  /** Pinned color preset; null lets the banding follow the zoom depth */
  colorPreset: ColorPresetName | null;
  status: RenderStatusState;
  precision: PrecisionInfo | null;
  lastRenderTime: number;
  renderedGeneration: number;
};

type Actions = {
  setViewport: (viewport: Viewport) => void;
  setSettings: (
    settings: Partial<Pick<State, "baseIterations" | "iterationCap" | "dynamicIterations" | "quality" | "colorPreset">>
  ) => void;
  setStatus: (status: RenderStatusState) => void;
  recordRender: (generation: number, precision: PrecisionInfo, renderTime: number) => void;
};

export type ViewportStoreState = State & Actions;
export type ViewportStore = ReturnType<typeof createViewportStore>;

/**
 * Home view for a session: the configured home bounds fitted to the surface size.
 */
export function homeViewport(config: ExplorerConfig): Viewport {
  const unfitted: Viewport = {
    pixelWidth: config.pixelWidth,
    pixelHeight: config.pixelHeight,
    bounds: { ...config.homeBounds },
    zoomLevel: 1,
    maxIterations: config.baseIterations,
    colorParams: { ...defaultColorParams, rgbThetas: [...defaultColorParams.rgbThetas] },
    oversampling: config.oversampling,
  };
  return fitAspectRatio(unfitted, config.pixelWidth, config.pixelHeight);
}

export const initialViewportState = (config: ExplorerConfig): State => ({
  viewport: homeViewport(config),
  baseIterations: config.baseIterations,
  iterationCap: config.iterationCap,
  dynamicIterations: config.dynamicIterations,
  quality: config.quality,
  colorPreset: null,
  status: { kind: "idle", message: "Ready" },
  precision: null,
  lastRenderTime: 0,
  renderedGeneration: 0,
});

/**
 * Creates the store for one session. Each controller owns its own store;
 * there is no module-level instance.
 */
export const createViewportStore = (config: ExplorerConfig) =>
  createStore<State & Actions>()((set) => ({
    ...initialViewportState(config),

    setViewport: (viewport) => set({ viewport }),
    setSettings: (settings) => set(settings),
    setStatus: (status) => set({ status }),
    recordRender: (renderedGeneration, precision, lastRenderTime) =>
      set({ renderedGeneration, precision, lastRenderTime }),
  }));
