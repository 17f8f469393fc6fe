import { createTicker, withTimeout } from "./common";
import type { ChannelConfiguration } from "./configuration";
import { DeliveryError } from "./errors";
import type { ChannelQueue } from "./hub/queue";
import { createChannelQueue } from "./hub/queue";
import type {
  Alert,
  ChannelMessages,
  ChannelName,
  DetectionBatch,
  TelemetrySnapshot,
  VideoFrame,
} from "./model";
import { channelNames } from "./model";

export type Client = {
  send: (
    channel: ChannelName,
    message: ChannelMessages[ChannelName],
  ) => Promise<void> | void;
};

export type ChannelStats = {
  queued: number;
  dropped: number;
  subscribers: number;
};

export type HubStats = {
  clients: number;
  channels: Record<ChannelName, ChannelStats>;
};

export type BroadcastHub = {
  connect: (clientId: string, client: Client) => void;
  disconnect: (clientId: string) => boolean;
  subscribe: (clientId: string, channel: ChannelName) => boolean;
  unsubscribe: (clientId: string, channel: ChannelName) => boolean;
  publish: <C extends ChannelName>(
    channel: C,
    message: ChannelMessages[C],
  ) => Promise<boolean>;
  deliverNext: (channel: ChannelName, timeout?: number) => Promise<boolean>;
  subscribers: (channel: ChannelName) => string[];
  channels: (clientId: string) => ChannelName[];
  stats: () => HubStats;
  start: () => void;
  stop: () => Promise<void>;
};

export type BroadcastHubOptions = {
  channels: Record<ChannelName, ChannelConfiguration>;
  deliveryTimeout: number;
  publishTimeout: number;
  /**
   * Longest wait for an item on event-driven channels before re-checking
   * shutdown.
   */
  idleTimeout?: number;
};

type Queues = { [C in ChannelName]: ChannelQueue<ChannelMessages[C]> };

type Connection = {
  client: Client;
  channels: Set<ChannelName>;
};

export const createBroadcastHub = ({
  channels,
  deliveryTimeout,
  publishTimeout,
  idleTimeout = 250,
}: BroadcastHubOptions) => {
  const queues: Queues = {
    telemetry: createChannelQueue<TelemetrySnapshot>(
      channels.telemetry,
      publishTimeout,
    ),
    video: createChannelQueue<VideoFrame>(channels.video, publishTimeout),
    detections: createChannelQueue<DetectionBatch>(
      channels.detections,
      publishTimeout,
    ),
    alerts: createChannelQueue<Alert>(channels.alerts, publishTimeout),
  };

  const connections = new Map<string, Connection>();
  const members = {
    telemetry: new Set<string>(),
    video: new Set<string>(),
    detections: new Set<string>(),
    alerts: new Set<string>(),
  } satisfies Record<ChannelName, Set<string>>;

  const controller = new AbortController();
  let loops: Promise<void>[] = [];

  const leave = (clientId: string, channel: ChannelName) => {
    members[channel].delete(clientId);
    return connections.get(clientId)?.channels.delete(channel) ?? false;
  };

  const disconnect = (clientId: string) => {
    const connection = connections.get(clientId);
    if (!connection) return false;
    for (const channel of connection.channels)
      members[channel].delete(clientId);
    connections.delete(clientId);
    console.log("Client disconnected", { clientId });
    return true;
  };

  const connect = (clientId: string, client: Client) => {
    if (connections.has(clientId)) disconnect(clientId);
    connections.set(clientId, { client, channels: new Set() });
    console.log("Client connected", { clientId });
  };

  const subscribe = (clientId: string, channel: ChannelName) => {
    const connection = connections.get(clientId);
    if (!connection) {
      console.warn("Subscribe from unknown client", { clientId, channel });
      return false;
    }
    connection.channels.add(channel);
    members[channel].add(clientId);
    return true;
  };

  const unsubscribe = (clientId: string, channel: ChannelName) =>
    leave(clientId, channel);

  const publish = <C extends ChannelName>(
    channel: C,
    message: ChannelMessages[C],
  ) => queues[channel].offer(message);

  const deliver = async (
    clientId: string,
    channel: ChannelName,
    message: ChannelMessages[ChannelName],
  ) => {
    const connection = connections.get(clientId);
    if (!connection || !members[channel].has(clientId)) return;
    try {
      await withTimeout(
        Promise.resolve(connection.client.send(channel, message)),
        deliveryTimeout,
      );
    } catch (cause) {
      const error = new DeliveryError(clientId, channel, cause);
      console.warn("Dropping subscriber", { error: error.message });
      leave(clientId, channel);
    }
  };

  /**
   * Takes one queued message and hands it to every current subscriber, one
   * after the other. With a timeout, waits that long for a message.
   */
  const deliverNext = async (channel: ChannelName, timeout = 0) => {
    const queue = queues[channel];
    const message = timeout > 0 ? await queue.take(timeout) : queue.poll();
    if (message === undefined) return false;
    for (const clientId of [...members[channel]])
      await deliver(clientId, channel, message);
    return true;
  };

  const start = () => {
    if (loops.length) return;
    loops = channelNames.map(channel => {
      const { period } = channels[channel];
      const timeout = period > 0 ? 0 : idleTimeout;
      return createTicker(
        `broadcast:${channel}`,
        async () => {
          await deliverNext(channel, timeout);
        },
        period,
        controller.signal,
      ).done;
    });
    console.log("Broadcast hub started", {
      channels: channelNames.map(_ => `${_}@${channels[_].period}ms`),
    });
  };

  const stop = async () => {
    controller.abort();
    for (const channel of channelNames) queues[channel].close();
    await Promise.all(loops);
    console.log("Broadcast hub stopped");
  };

  const channelStats = (channel: ChannelName): ChannelStats => ({
    queued: queues[channel].length,
    dropped: queues[channel].dropped,
    subscribers: members[channel].size,
  });

  const stats = (): HubStats => ({
    clients: connections.size,
    channels: {
      telemetry: channelStats("telemetry"),
      video: channelStats("video"),
      detections: channelStats("detections"),
      alerts: channelStats("alerts"),
    },
  });

  return {
    connect,
    disconnect,
    subscribe,
    unsubscribe,
    publish,
    deliverNext,
    subscribers: channel => [...members[channel]],
    channels: clientId => [...(connections.get(clientId)?.channels ?? [])],
    stats,
    start,
    stop,
  } satisfies BroadcastHub;
};
