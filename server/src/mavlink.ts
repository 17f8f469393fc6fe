import { Readable, Writable } from "node:stream";

import type { MavLinkData, MavLinkPacket } from "node-mavlink";
import {
  ardupilotmega,
  common,
  createMavLinkStream,
  MavLinkProtocolV2,
  minimal,
  send as mavlinkSend,
} from "node-mavlink";

import type { Channel } from "./channel";
import { withTimeout } from "./common";

const registry = {
  ...minimal.REGISTRY,
  ...common.REGISTRY,
  ...ardupilotmega.REGISTRY,
} as const;

export type Mavlink = Channel<MavLinkData> & {
  receive: <T extends MavLinkData>(
    type: new (...args: unknown[]) => T,
    condition?: (message: T) => boolean,
    timeout?: number,
  ) => Promise<T>;
  heartbeat: () => Promise<void>;
  requestStreams: (rate: number) => Promise<void>;
};

export const createMavlink = (channel: Channel<Uint8Array>) => {
  const readable = new Readable({ read: () => [] });
  const reader = createMavLinkStream(readable);

  const read = (handler: (message: MavLinkData) => void) => {
    const packetHandler = (packet: MavLinkPacket) => {
      const { header, protocol, payload } = packet;
      const messageId = header.msgid as unknown as keyof typeof registry;
      const type = registry[messageId];
      if (!type) return;

      handler(protocol.data(payload, type));
    };
    reader.on("data", packetHandler);
    return () => {
      reader.off("data", packetHandler);
    };
  };

  const destroyRead = channel.read(data => readable.push(data));

  const protocol = new MavLinkProtocolV2(
    255,
    minimal.MavComponent.MISSIONPLANNER,
  );

  const writable = new Writable({
    write: (data, _, callback) => {
      channel.write(data).then(
        () => callback(),
        (error: Error) => callback(error),
      );
    },
  });

  const write = async (message: MavLinkData) => {
    await mavlinkSend(writable, message, protocol);
  };

  const receive = async <T extends MavLinkData>(
    type: new (...args: unknown[]) => T,
    condition?: (message: T) => boolean,
    timeout?: number,
  ) => {
    let unsubscribe: (() => void) | undefined;
    const received = new Promise<T>(resolve => {
      unsubscribe = read(message => {
        if (message instanceof type && (!condition || condition(message)))
          resolve(message);
      });
    });
    try {
      return await (timeout === undefined
        ? received
        : withTimeout(
            received,
            timeout,
            `No ${type.name} within ${timeout}ms`,
          ));
    } finally {
      unsubscribe?.();
    }
  };

  const heartbeat = async () => {
    const message = new minimal.Heartbeat();
    message.type = minimal.MavType.GCS;
    message.autopilot = minimal.MavAutopilot.INVALID;
    message.systemStatus = minimal.MavState.ACTIVE;
    await write(message);
  };

  const requestStreams = async (rate: number) => {
    const message = new common.RequestDataStream();
    message.targetSystem = 1;
    message.targetComponent = 0;
    message.reqStreamId = common.MavDataStream.ALL;
    message.reqMessageRate = rate;
    message.startStop = 1;
    await write(message);
  };

  const destroy = () => {
    destroyRead();
    readable.destroy();
    writable.destroy();
    channel.destroy();
  };

  return {
    read,
    write,
    receive,
    heartbeat,
    requestStreams,
    destroy,
  } satisfies Mavlink;
};
