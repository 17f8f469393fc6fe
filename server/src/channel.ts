import { Socket } from "node:net";

export type Channel<T> = {
  read: (handler: (data: T) => void) => () => void;
  write: (data: T) => Promise<void>;
  destroy: () => void;
};

export const connectTcpChannel = (
  host: string,
  port: number,
  timeout: number,
) =>
  new Promise<Channel<Uint8Array>>((resolve, reject) => {
    const socket = new Socket();
    const handlers = new Set<(data: Uint8Array) => void>();

    const read = (handler: (data: Uint8Array) => void) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    };

    const write = (data: Uint8Array) =>
      new Promise<void>((resolve, reject) =>
        socket.write(data, error => (error ? reject(error) : resolve())),
      );

    const destroy = () => {
      handlers.clear();
      socket.destroy();
    };

    const onConnectError = (error: Error) => {
      socket.destroy();
      reject(error);
    };

    socket.setTimeout(timeout, () =>
      onConnectError(new Error(`Connection to ${host}:${port} timed out`)),
    );
    socket.once("error", onConnectError);
    socket.on("data", data => handlers.forEach(_ => _(data)));
    socket.connect(port, host, () => {
      socket.setTimeout(0);
      socket.off("error", onConnectError);
      socket.on("error", error =>
        console.warn("Flight controller link error", { error: error.message }),
      );
      resolve({ read, write, destroy } satisfies Channel<Uint8Array>);
    });
  });
