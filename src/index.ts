export * from "./config";
export * from "./controller/viewport-controller";
export * from "./export/ppm";
export * from "./fractals/types";
export type { FractalAlgorithm, IterationOptions, IterationResult } from "./fractals/algorithms/base";
export { colorPoint, sinColor, smoothIterationCount } from "./fractals/algorithms/coloring";
export { MandelbrotAlgorithm, mandelbrotAlgorithm } from "./fractals/algorithms/mandelbrot";
export * from "./fractals/render/engine";
export { computeFrame } from "./fractals/render/frame";
export * from "./fractals/render/scheduler";
export { nodeEndpoint, type NodeMessagePort } from "./fractals/workers/node-endpoint";
export type { RenderWorkerAPI } from "./fractals/workers/render-worker-api";
export * from "./fractals/workers/worker-engine";
export * from "./lib/color-params";
export * from "./lib/coordinates";
export { default as debounce, type Debounced } from "./lib/debounce";
export * from "./lib/errors";
export * from "./lib/history";
export * from "./lib/iterations";
export * from "./lib/performance-monitor";
export * from "./lib/zoom";
export * from "./state/viewport-store";
