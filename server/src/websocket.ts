import type { RawData } from "ws";
import WebSocket from "ws";

import type { Channel } from "./channel";

export const toBuffer = (data: RawData) => {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
};

export const connectWebSocketChannel = (url: string, timeout: number) =>
  new Promise<Channel<Uint8Array>>((resolve, reject) => {
    const socket = new WebSocket(url, { handshakeTimeout: timeout });
    socket.binaryType = "nodebuffer";
    const handlers = new Set<(data: Uint8Array) => void>();

    const read = (handler: (data: Uint8Array) => void) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    };

    const write = (data: Uint8Array) =>
      new Promise<void>((resolve, reject) =>
        socket.send(data, error => (error ? reject(error) : resolve())),
      );

    const destroy = () => {
      handlers.clear();
      socket.terminate();
    };

    const onConnectError = (error: Error) => {
      socket.terminate();
      reject(error);
    };

    socket.once("error", onConnectError);
    socket.on("message", data => {
      const buffer = toBuffer(data);
      handlers.forEach(_ => _(buffer));
    });
    socket.once("open", () => {
      socket.off("error", onConnectError);
      socket.on("error", error =>
        console.warn("Flight controller link error", { error: error.message }),
      );
      resolve({ read, write, destroy } satisfies Channel<Uint8Array>);
    });
  });
