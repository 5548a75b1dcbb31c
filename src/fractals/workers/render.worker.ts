// ABOUTME: Worker thread entry for frame computation
// ABOUTME: Exposes the render worker API to the spawning thread via Comlink

import * as Comlink from "comlink";
import { parentPort } from "node:worker_threads";

import { nodeEndpoint } from "./node-endpoint";
import { renderWorkerAPI } from "./render-worker-api";

if (!parentPort) {
  throw new Error("render.worker must be started as a worker thread");
}

Comlink.expose(renderWorkerAPI, nodeEndpoint(parentPort));
