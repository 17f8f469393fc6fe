import { expect, test } from "vitest";

import { delay } from "./common";
import type { ChannelConfiguration } from "./configuration";
import { defaultConfiguration } from "./configuration";
import type { Client } from "./hub";
import { createBroadcastHub } from "./hub";
import type {
  Alert,
  ChannelMessages,
  ChannelName,
  TelemetrySnapshot,
} from "./model";

const snapshot = (flight_time: number): TelemetrySnapshot => ({
  timestamp: "2026-01-01T00:00:00.000Z",
  armed: false,
  flying: false,
  mode: "DISARMED",
  position: { lat: 33.6844, lng: 73.0479, alt: 0 },
  heading: 0,
  speed: 0,
  battery_pct: 100,
  flight_time,
  mission: null,
  alerts: [],
  gps: null,
  hardware: "mock",
});

const alert = (id: number): Alert => ({
  id,
  message: `alert ${id}`,
  severity: "warning",
  type: "general",
  timestamp: "2026-01-01T00:00:00.000Z",
});

type Received = { channel: ChannelName; message: ChannelMessages[ChannelName] };

const recorder = () => {
  const received: Received[] = [];
  const client: Client = {
    send: (channel, message) => {
      received.push({ channel, message });
    },
  };
  return { client, received };
};

const flightTimes = (received: Received[]) =>
  received.map(({ message }) =>
    "flight_time" in message ? message.flight_time : undefined,
  );

const createHub = (
  channels: Partial<Record<ChannelName, ChannelConfiguration>> = {},
  deliveryTimeout = 100,
) =>
  createBroadcastHub({
    channels: { ...defaultConfiguration.channels, ...channels },
    deliveryTimeout,
    publishTimeout: 50,
    idleTimeout: 10,
  });

test("telemetry queue keeps at most 100 items and drops the overflow", async () => {
  const hub = createHub();
  for (let i = 0; i < 150; i++) await hub.publish("telemetry", snapshot(i));

  const { telemetry } = hub.stats().channels;
  expect(telemetry.queued).toBe(100);
  expect(telemetry.dropped).toBe(50);
});

test("delivers in publish order to subscribers only", async () => {
  const hub = createHub();
  const subscribed = recorder();
  const other = recorder();
  hub.connect("a", subscribed.client);
  hub.connect("b", other.client);
  hub.subscribe("a", "telemetry");
  hub.subscribe("b", "alerts");

  for (let i = 0; i < 3; i++) await hub.publish("telemetry", snapshot(i));
  while (await hub.deliverNext("telemetry"));

  expect(flightTimes(subscribed.received)).toEqual([0, 1, 2]);
  expect(subscribed.received.every(_ => _.channel === "telemetry")).toBe(true);
  expect(other.received).toEqual([]);
});

test("new clients start without subscriptions", () => {
  const hub = createHub();
  hub.connect("a", recorder().client);

  expect(hub.channels("a")).toEqual([]);
  expect(hub.subscribers("telemetry")).toEqual([]);
});

test("unsubscribe stops delivery on that channel only", async () => {
  const hub = createHub();
  const { client, received } = recorder();
  hub.connect("a", client);
  hub.subscribe("a", "telemetry");
  hub.subscribe("a", "alerts");
  hub.unsubscribe("a", "telemetry");

  await hub.publish("telemetry", snapshot(1));
  await hub.publish("alerts", alert(1));
  await hub.deliverNext("telemetry");
  await hub.deliverNext("alerts");

  expect(received.map(_ => _.channel)).toEqual(["alerts"]);
  expect(hub.channels("a")).toEqual(["alerts"]);
});

test("subscribe from an unknown client is refused", () => {
  const hub = createHub();
  expect(hub.subscribe("ghost", "telemetry")).toBe(false);
  expect(hub.subscribers("telemetry")).toEqual([]);
});

test("a failing client is dropped from that channel and others keep receiving", async () => {
  const hub = createHub();
  const healthy = recorder();
  hub.connect("healthy", healthy.client);
  hub.connect("broken", {
    send: () => {
      throw new Error("socket gone");
    },
  });
  for (const id of ["broken", "healthy"]) {
    hub.subscribe(id, "telemetry");
    hub.subscribe(id, "alerts");
  }

  await hub.publish("telemetry", snapshot(1));
  await hub.publish("telemetry", snapshot(2));
  await expect(hub.deliverNext("telemetry")).resolves.toBe(true);
  await expect(hub.deliverNext("telemetry")).resolves.toBe(true);

  expect(flightTimes(healthy.received)).toEqual([1, 2]);
  expect(hub.subscribers("telemetry")).toEqual(["healthy"]);
  expect(hub.subscribers("alerts")).toEqual(["broken", "healthy"]);
});

test("a client that disconnects mid-broadcast is not contacted again", async () => {
  const hub = createHub();
  const late = recorder();
  let first = 0;
  hub.connect("first", {
    send: () => {
      first++;
      if (first === 1) hub.disconnect("late");
    },
  });
  hub.connect("late", late.client);
  hub.subscribe("first", "telemetry");
  hub.subscribe("late", "telemetry");

  for (let i = 0; i < 3; i++) await hub.publish("telemetry", snapshot(i));
  while (await hub.deliverNext("telemetry"));

  expect(first).toBe(3);
  expect(late.received).toEqual([]);
  expect(hub.stats().clients).toBe(1);
});

test("the remaining client receives everything after another disconnects", async () => {
  const hub = createHub();
  const stays = recorder();
  const leaves = recorder();
  hub.connect("stays", stays.client);
  hub.connect("leaves", leaves.client);
  hub.subscribe("stays", "telemetry");
  hub.subscribe("leaves", "telemetry");

  await hub.publish("telemetry", snapshot(0));
  await hub.deliverNext("telemetry");
  hub.disconnect("leaves");
  for (let i = 1; i < 4; i++) await hub.publish("telemetry", snapshot(i));
  while (await hub.deliverNext("telemetry"));

  expect(flightTimes(stays.received)).toEqual([0, 1, 2, 3]);
  expect(flightTimes(leaves.received)).toEqual([0]);
});

test("a client that never answers is dropped after the delivery timeout", async () => {
  const hub = createHub({}, 20);
  hub.connect("stuck", { send: () => new Promise<void>(() => {}) });
  hub.subscribe("stuck", "video");

  await hub.publish("video", {
    frame: "",
    format: "jpeg",
    sequence: 0,
    timestamp: "2026-01-01T00:00:00.000Z",
  });
  await hub.deliverNext("video");

  expect(hub.subscribers("video")).toEqual([]);
  expect(hub.channels("stuck")).toEqual([]);
});

test("alerts are never dropped when the queue is full", async () => {
  const hub = createHub({
    alerts: { capacity: 2, period: 0, overflow: "block" },
  });
  const { client, received } = recorder();
  hub.connect("a", client);
  hub.subscribe("a", "alerts");

  for (let i = 1; i <= 4; i++)
    await expect(hub.publish("alerts", alert(i))).resolves.toBe(true);
  expect(hub.stats().channels.alerts).toEqual({
    queued: 4,
    dropped: 0,
    subscribers: 1,
  });

  while (await hub.deliverNext("alerts"));
  const ids = received.map(({ message }) =>
    "id" in message ? message.id : 0,
  );
  expect(ids).toEqual([1, 2, 3, 4]);
});

test("loops deliver on their own cadence and stop cleanly", async () => {
  const hub = createHub({
    telemetry: { capacity: 100, period: 5, overflow: "drop-newest" },
  });
  const { client, received } = recorder();
  hub.connect("a", client);
  hub.subscribe("a", "telemetry");
  hub.subscribe("a", "alerts");
  hub.start();

  await hub.publish("telemetry", snapshot(1));
  await hub.publish("alerts", alert(1));
  const deadline = Date.now() + 2000;
  while (received.length < 2 && Date.now() < deadline) await delay(5);
  await hub.stop();

  expect(received.map(_ => _.channel).sort()).toEqual(["alerts", "telemetry"]);
});
