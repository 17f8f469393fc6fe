import { randomUUID } from "node:crypto";

import WebSocket, { WebSocketServer } from "ws";

import type { CommandRouter } from "./command";
import { respond } from "./command";
import { fatal } from "./common";
import { DeadlockError, describe, ValidationError } from "./errors";
import type { BroadcastHub } from "./hub";
import type { ChannelMessages, ChannelName, CommandResponse } from "./model";
import { channelNames } from "./model";
import { toBuffer } from "./websocket";

export type ClientMessage =
  | { type: "subscribe"; channel: ChannelName }
  | { type: "unsubscribe"; channel: ChannelName }
  | { type: "command"; command: string; params: unknown };

export type ServerMessage =
  | {
      type: "connected";
      payload: { clientId: string; channels: readonly ChannelName[] };
    }
  | { type: "subscribed" | "unsubscribed"; payload: { channel: ChannelName } }
  | { type: "ack"; payload: CommandResponse & { command: string } }
  | { type: "error"; payload: { message: string } }
  | { type: ChannelName; payload: ChannelMessages[ChannelName] };

const isChannel = (value: unknown): value is ChannelName =>
  channelNames.some(_ => _ === value);

export const parseClientMessage = (raw: string): ClientMessage => {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new ValidationError("Message is not valid JSON");
  }
  if (typeof data !== "object" || data === null)
    throw new ValidationError("Message must be an object");

  const type = "type" in data ? data.type : undefined;
  switch (type) {
    case "subscribe":
    case "unsubscribe": {
      const channel = "channel" in data ? data.channel : undefined;
      if (!isChannel(channel))
        throw new ValidationError(
          `Unknown channel, expected one of ${channelNames.join(", ")}`,
        );
      return { type, channel };
    }
    case "command": {
      const command = "command" in data ? data.command : undefined;
      if (typeof command !== "string")
        throw new ValidationError("command must be a string");
      const params = "params" in data ? data.params : undefined;
      return { type, command, params };
    }
    default:
      throw new ValidationError(`Unknown message type: ${String(type)}`);
  }
};

export type Session = {
  receive: (raw: string) => Promise<void>;
  close: () => void;
};

export type SessionOptions = {
  clientId: string;
  hub: BroadcastHub;
  router: CommandRouter;
  send: (message: ServerMessage) => Promise<void>;
};

/** One connected client: hub membership plus its inbound message handling. */
export const createSession = ({
  clientId,
  hub,
  router,
  send,
}: SessionOptions) => {
  hub.connect(clientId, {
    send: (channel, message) => send({ type: channel, payload: message }),
  });

  const reply = (message: ServerMessage) =>
    send(message).catch((error: unknown) =>
      console.warn("Reply failed", { clientId, error: describe(error) }),
    );

  void reply({
    type: "connected",
    payload: { clientId, channels: channelNames },
  });

  const receive = async (raw: string) => {
    let message: ClientMessage;
    try {
      message = parseClientMessage(raw);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      await reply({ type: "error", payload: { message: error.message } });
      return;
    }

    switch (message.type) {
      case "subscribe":
        hub.subscribe(clientId, message.channel);
        await reply({
          type: "subscribed",
          payload: { channel: message.channel },
        });
        return;
      case "unsubscribe":
        hub.unsubscribe(clientId, message.channel);
        await reply({
          type: "unsubscribed",
          payload: { channel: message.channel },
        });
        return;
      case "command": {
        const result = await router.execute(message.command, message.params);
        await reply({
          type: "ack",
          payload: { ...respond(result), command: message.command },
        });
        return;
      }
    }
  };

  return {
    receive,
    close: () => {
      hub.disconnect(clientId);
    },
  } satisfies Session;
};

export type Server = {
  /** Resolves with the bound port. */
  listening: Promise<number>;
  close: () => Promise<void>;
};

export type ServerOptions = {
  port: number;
  hub: BroadcastHub;
  router: CommandRouter;
};

export const createServer = ({ port, hub, router }: ServerOptions) => {
  const server = new WebSocketServer({ port });

  server.on("connection", socket => {
    const session = createSession({
      clientId: randomUUID(),
      hub,
      router,
      send: message =>
        new Promise<void>((resolve, reject) => {
          if (socket.readyState !== WebSocket.OPEN)
            return reject(new Error("Socket is not open"));
          socket.send(JSON.stringify(message), error =>
            error ? reject(error) : resolve(),
          );
        }),
    });

    socket.on("message", data => {
      const raw = toBuffer(data).toString("utf8");
      session.receive(raw).catch((error: unknown) => {
        if (error instanceof DeadlockError) return fatal(error);
        console.error("Message handling failed", { error: describe(error) });
      });
    });
    socket.on("error", error => {
      console.warn("Client socket error", { error: error.message });
      session.close();
    });
    socket.on("close", () => session.close());
  });

  server.on("error", error =>
    console.error("Server error", { error: error.message }),
  );

  const listening = new Promise<number>((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const bound =
        typeof address === "object" && address !== null ? address.port : port;
      console.log("Listening", { port: bound });
      resolve(bound);
    });
  });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      for (const socket of server.clients) socket.terminate();
      server.close(error => (error ? reject(error) : resolve()));
    });

  return { listening, close } satisfies Server;
};
