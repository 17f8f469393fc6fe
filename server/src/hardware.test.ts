import { expect, test } from "vitest";

import type { MavLinkData } from "node-mavlink";
import { common, minimal, MavLinkProtocolV2 } from "node-mavlink";

import type { Channel } from "./channel";
import { defaultConfiguration } from "./configuration";
import type { HardwareAdapter } from "./hardware";
import {
  createDegradingAdapter,
  createDeviceAdapter,
  createMockAdapter,
  probeHardware,
} from "./hardware";
import type { Mavlink } from "./mavlink";

const base = { lat: 33.6844, lng: 73.0479, alt: 0 };

const fakeMavlink = () => {
  const handlers = new Set<(message: MavLinkData) => void>();
  const state = { destroyed: false };
  const mavlink: Mavlink = {
    read: handler => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    write: async () => {},
    receive: () => Promise.reject(new Error("Not expected")),
    heartbeat: async () => {},
    requestStreams: async () => {},
    destroy: () => {
      state.destroyed = true;
    },
  };
  const emit = (message: MavLinkData) => handlers.forEach(_ => _(message));
  return { mavlink, emit, state };
};

const fakeChannel = () => {
  const handlers = new Set<(data: Uint8Array) => void>();
  const state = { destroyed: false };
  const channel: Channel<Uint8Array> = {
    read: handler => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    write: async () => {},
    destroy: () => {
      state.destroyed = true;
    },
  };
  const emit = (data: Uint8Array) => handlers.forEach(_ => _(data));
  return { channel, emit, state };
};

const globalPosition = () => {
  const message = new common.GlobalPositionInt();
  message.lat = 336844000;
  message.lon = 730479000;
  message.relativeAlt = 12500;
  message.hdg = 9000;
  return message;
};

test("device adapter decodes flight controller messages", () => {
  const { mavlink, emit } = fakeMavlink();
  const adapter = createDeviceAdapter(mavlink, {
    staleTimeout: 5000,
    heartbeatPeriod: 60000,
  });
  expect(adapter.sample()).toBeUndefined();

  emit(globalPosition());
  const status = new common.SysStatus();
  status.batteryRemaining = 64;
  emit(status);
  const hud = new common.VfrHud();
  hud.groundspeed = 7.5;
  hud.heading = 180;
  emit(hud);
  const gps = new common.GpsRawInt();
  gps.satellitesVisible = 11;
  gps.fixType = 3;
  emit(gps);

  const sample = adapter.sample();
  expect(sample?.source).toBe("device");
  expect(sample?.position.lat).toBeCloseTo(33.6844, 6);
  expect(sample?.position.lng).toBeCloseTo(73.0479, 6);
  expect(sample?.position.alt).toBeCloseTo(12.5, 6);
  expect(sample?.heading).toBe(180);
  expect(sample?.speed).toBe(7.5);
  expect(sample?.battery).toBe(64);
  expect(sample?.gps).toEqual({ satellites: 11, fix: 3 });
  adapter.destroy();
});

test("device adapter ignores unknown battery and heading values", () => {
  const { mavlink, emit } = fakeMavlink();
  const adapter = createDeviceAdapter(mavlink, {
    staleTimeout: 5000,
    heartbeatPeriod: 60000,
  });
  const position = globalPosition();
  position.hdg = 65535;
  emit(position);
  const status = new common.SysStatus();
  status.batteryRemaining = -1;
  emit(status);

  expect(adapter.sample()?.heading).toBeUndefined();
  expect(adapter.sample()?.battery).toBeUndefined();
  adapter.destroy();
});

test("device adapter turns unhealthy once the link goes quiet", () => {
  let clock = 1000;
  const { mavlink, emit, state } = fakeMavlink();
  const adapter = createDeviceAdapter(mavlink, {
    staleTimeout: 5000,
    heartbeatPeriod: 60000,
    now: () => clock,
  });

  clock = 5999;
  expect(adapter.health()).toBe(true);
  clock = 6000;
  expect(adapter.health()).toBe(false);
  emit(new minimal.Heartbeat());
  expect(adapter.health()).toBe(true);

  adapter.destroy();
  expect(state.destroyed).toBe(true);
});

test("device adapter takes fixes from the GPS receiver", () => {
  const { mavlink } = fakeMavlink();
  const adapter = createDeviceAdapter(mavlink, {
    staleTimeout: 5000,
    heartbeatPeriod: 60000,
  });
  adapter.ingestGps({
    lat: 1,
    lng: 2,
    altitude: 3,
    satellites: 3,
    timestamp: Date.now(),
  });

  expect(adapter.sample()).toMatchObject({
    position: { lat: 1, lng: 2, alt: 3 },
    gps: { satellites: 3, fix: 2 },
  });
  adapter.destroy();
});

test("mock adapter reads around its base position", () => {
  const adapter = createMockAdapter({
    base,
    pollPeriod: 1000,
    random: () => 0.5,
  });

  expect(adapter.mode).toBe("mock");
  expect(adapter.health()).toBe(true);
  expect(adapter.sample()).toMatchObject({
    source: "mock",
    position: base,
    gps: { satellites: 10, fix: 3 },
  });
  adapter.destroy();
});

test("mock adapter samples are copies", () => {
  const adapter = createMockAdapter({
    base,
    pollPeriod: 1000,
    random: () => 0.5,
  });
  const sample = adapter.sample();
  if (sample) sample.position.lat = 0;

  expect(adapter.sample()?.position.lat).toBe(base.lat);
  adapter.destroy();
});

test("degrading adapter switches to the fallback for good", () => {
  let healthy = true;
  let destroyed = 0;
  let fallbacks = 0;
  const device: HardwareAdapter = {
    mode: "device",
    sample: () => undefined,
    health: () => healthy,
    ingestGps: () => {},
    destroy: () => {
      destroyed++;
    },
  };
  const adapter = createDegradingAdapter(device, () => {
    fallbacks++;
    return createMockAdapter({ base, pollPeriod: 1000, random: () => 0.5 });
  });

  expect(adapter.mode).toBe("device");
  healthy = false;
  expect(adapter.mode).toBe("mock");
  healthy = true;
  expect(adapter.mode).toBe("mock");
  expect(adapter.sample()?.source).toBe("mock");
  expect(destroyed).toBe(1);
  expect(fallbacks).toBe(1);
  adapter.destroy();
});

const hardware = (endpoint: string | undefined) => ({
  ...defaultConfiguration.hardware,
  endpoint,
  connectTimeout: 50,
});

test("probe uses the mock adapter without an endpoint", async () => {
  let connects = 0;
  const adapter = await probeHardware({
    hardware: hardware(undefined),
    base,
    random: () => 0.5,
    connect: async () => {
      connects++;
      return fakeChannel().channel;
    },
  });

  expect(adapter.mode).toBe("mock");
  expect(connects).toBe(0);
  adapter.destroy();
});

test("probe falls back when the connection fails", async () => {
  const adapter = await probeHardware({
    hardware: hardware("tcp://127.0.0.1:5760"),
    base,
    random: () => 0.5,
    connect: () => Promise.reject(new Error("connection refused")),
  });

  expect(adapter.mode).toBe("mock");
  adapter.destroy();
});

test("probe falls back when no heartbeat arrives in time", async () => {
  const { channel, state } = fakeChannel();
  const adapter = await probeHardware({
    hardware: hardware("tcp://127.0.0.1:5760"),
    base,
    random: () => 0.5,
    connect: async () => channel,
  });

  expect(adapter.mode).toBe("mock");
  expect(state.destroyed).toBe(true);
  adapter.destroy();
});

test("probe picks the device adapter once a heartbeat arrives", async () => {
  const { channel, emit, state } = fakeChannel();
  const adapter = await probeHardware({
    hardware: { ...hardware("tcp://127.0.0.1:5760"), connectTimeout: 1000 },
    base,
    random: () => 0.5,
    connect: async () => {
      const heartbeat = new MavLinkProtocolV2(1, 1).serialize(
        new minimal.Heartbeat(),
        0,
      );
      setTimeout(() => emit(heartbeat), 10);
      return channel;
    },
  });

  expect(adapter.mode).toBe("device");
  adapter.destroy();
  expect(state.destroyed).toBe(true);
});
