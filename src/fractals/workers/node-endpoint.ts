import type { Endpoint } from "comlink";

/**
 * The part of a worker_threads Worker or MessagePort that Comlink needs.
 * Both speak the EventEmitter dialect (`on`/`off`) and deliver the message
 * payload itself rather than a MessageEvent.
 */
export interface NodeMessagePort {
  postMessage(message: unknown, transferList?: ArrayBuffer[]): void;
  on(event: "message", listener: (data: unknown) => void): unknown;
  off(event: "message", listener: (data: unknown) => void): unknown;
}

/**
 * Adapts a worker_threads port to the DOM-style Endpoint Comlink speaks, so
 * `Comlink.wrap` and `Comlink.expose` run unchanged on Node worker threads.
 */
export function nodeEndpoint(port: NodeMessagePort): Endpoint {
  const handlers = new WeakMap<EventListenerOrEventListenerObject, (data: unknown) => void>();

  return {
    postMessage: (message, transfer) => {
      port.postMessage(message, transfer?.filter((item): item is ArrayBuffer => item instanceof ArrayBuffer));
    },
    addEventListener: (_type, listener) => {
      const handler = (data: unknown) => {
        const event = new MessageEvent("message", { data });
        if ("handleEvent" in listener) {
          listener.handleEvent(event);
        } else {
          listener(event);
        }
      };
      handlers.set(listener, handler);
      port.on("message", handler);
    },
    removeEventListener: (_type, listener) => {
      const handler = handlers.get(listener);
      if (handler) {
        port.off("message", handler);
        handlers.delete(listener);
      }
    },
  };
}
