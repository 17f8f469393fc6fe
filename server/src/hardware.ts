import { common, minimal } from "node-mavlink";

import type { Channel } from "./channel";
import { connectTcpChannel } from "./channel";
import type { Random } from "./common";
import { createTicker, randomInt, uniform } from "./common";
import type { HardwareConfiguration } from "./configuration";
import { describe, HardwareDegradedError } from "./errors";
import type { Mavlink } from "./mavlink";
import { createMavlink } from "./mavlink";
import type {
  Gps,
  GpsFix,
  HardwareMode,
  Position,
  TelemetrySample,
} from "./model";
import { connectWebSocketChannel } from "./websocket";

const { GlobalPositionInt, VfrHud, SysStatus, GpsRawInt } = common;
const { Heartbeat } = minimal;

export type HardwareAdapter = {
  readonly mode: HardwareMode;
  /** Latest reading, if any. Never waits on I/O. */
  sample: () => TelemetrySample | undefined;
  health: () => boolean;
  ingestGps: (fix: GpsFix) => void;
  destroy: () => void;
};

const copySample = (sample: TelemetrySample): TelemetrySample => ({
  ...sample,
  position: { ...sample.position },
  gps: { ...sample.gps },
});

export type DeviceAdapterOptions = {
  staleTimeout: number;
  heartbeatPeriod?: number;
  now?: () => number;
};

export const createDeviceAdapter = (
  mavlink: Mavlink,
  {
    staleTimeout,
    heartbeatPeriod = 1000,
    now = Date.now,
  }: DeviceAdapterOptions,
) => {
  let position: Position | undefined;
  let heading: number | undefined;
  let speed: number | undefined;
  let battery: number | undefined;
  let gps: Gps = { satellites: 0, fix: 0 };
  let time = now();

  const unsubscribe = mavlink.read(message => {
    time = now();
    if (message instanceof GlobalPositionInt) {
      position = {
        lat: message.lat / 1e7,
        lng: message.lon / 1e7,
        alt: message.relativeAlt / 1e3,
      };
      if (message.hdg !== 65535) heading = message.hdg / 100;
    } else if (message instanceof VfrHud) {
      speed = message.groundspeed;
      heading = message.heading;
    } else if (message instanceof SysStatus) {
      if (message.batteryRemaining >= 0) battery = message.batteryRemaining;
    } else if (message instanceof GpsRawInt)
      gps = { satellites: message.satellitesVisible, fix: message.fixType };
  });

  const ingestGps = ({ lat, lng, altitude, satellites, timestamp }: GpsFix) => {
    position = { lat, lng, alt: altitude };
    gps = { satellites, fix: satellites >= 4 ? 3 : 2 };
    time = Math.max(time, timestamp);
  };

  const sample = () =>
    position
      ? copySample({
          source: "device",
          time,
          position,
          heading,
          speed,
          battery,
          gps,
        })
      : undefined;

  const health = () => now() - time < staleTimeout;

  const interval = setInterval(() => {
    mavlink
      .heartbeat()
      .catch((error: unknown) =>
        console.warn("Heartbeat failed", { error: describe(error) }),
      );
  }, heartbeatPeriod);

  const destroy = () => {
    clearInterval(interval);
    unsubscribe();
    mavlink.destroy();
  };

  return {
    mode: "device",
    sample,
    health,
    ingestGps,
    destroy,
  } satisfies HardwareAdapter;
};

export type MockAdapterOptions = {
  base: Position;
  pollPeriod: number;
  random: Random;
};

/** Synthetic readings jittered around a base position. */
export const createMockAdapter = ({
  base,
  pollPeriod,
  random,
}: MockAdapterOptions) => {
  const controller = new AbortController();
  let origin = { ...base };

  const read = (): TelemetrySample => ({
    source: "mock",
    time: Date.now(),
    position: {
      lat: origin.lat + uniform(random, -0.0001, 0.0001),
      lng: origin.lng + uniform(random, -0.0001, 0.0001),
      alt: origin.alt + uniform(random, -1, 1),
    },
    gps: { satellites: randomInt(random, 8, 12), fix: 3 },
  });

  let latest = read();

  void createTicker(
    "mock-hardware",
    () => {
      latest = read();
    },
    pollPeriod,
    controller.signal,
  ).done;

  const ingestGps = ({ lat, lng, altitude }: GpsFix) => {
    origin = { lat, lng, alt: altitude };
  };

  return {
    mode: "mock",
    sample: () => copySample(latest),
    health: () => true,
    ingestGps,
    destroy: () => controller.abort(),
  } satisfies HardwareAdapter;
};

/**
 * Serves `device` until it first reports unhealthy, then switches to the
 * adapter built by `fallback` for good.
 */
export const createDegradingAdapter = (
  device: HardwareAdapter,
  fallback: () => HardwareAdapter,
) => {
  let current = device;

  const check = () => {
    if (current !== device || device.health()) return current;
    const error = new HardwareDegradedError(
      "Flight controller went silent, continuing on mock telemetry",
    );
    console.warn("Hardware degraded", { error: error.message });
    device.destroy();
    current = fallback();
    return current;
  };

  return {
    get mode() {
      return check().mode;
    },
    sample: () => check().sample(),
    health: () => check().health(),
    ingestGps: fix => check().ingestGps(fix),
    destroy: () => current.destroy(),
  } satisfies HardwareAdapter;
};

export type Connect = (
  endpoint: string,
  timeout: number,
) => Promise<Channel<Uint8Array>>;

export const connectChannel: Connect = (endpoint, timeout) => {
  const url = new URL(endpoint);
  switch (url.protocol) {
    case "tcp:":
      return connectTcpChannel(url.hostname, Number(url.port), timeout);
    case "ws:":
    case "wss:":
      return connectWebSocketChannel(endpoint, timeout);
    default:
      return Promise.reject(
        new Error(`Unsupported flight controller endpoint ${endpoint}`),
      );
  }
};

export type ProbeOptions = {
  hardware: HardwareConfiguration;
  base: Position;
  random: Random;
  connect?: Connect;
};

/**
 * Picks the device adapter when a flight controller answers with a heartbeat
 * within the connect timeout, the mock adapter otherwise.
 */
export const probeHardware = async ({
  hardware,
  base,
  random,
  connect = connectChannel,
}: ProbeOptions): Promise<HardwareAdapter> => {
  const { endpoint, connectTimeout, staleTimeout, pollPeriod } = hardware;
  const mock = () => createMockAdapter({ base, pollPeriod, random });

  if (!endpoint) {
    console.log("No flight controller configured, using mock telemetry");
    return mock();
  }

  const open = async () => {
    const mavlink = createMavlink(await connect(endpoint, connectTimeout));
    try {
      await mavlink.receive(Heartbeat, undefined, connectTimeout);
      await mavlink.requestStreams(10);
      return mavlink;
    } catch (error) {
      mavlink.destroy();
      throw error;
    }
  };

  try {
    const mavlink = await open();
    console.log("Connected to flight controller", { endpoint });
    return createDegradingAdapter(
      createDeviceAdapter(mavlink, { staleTimeout }),
      mock,
    );
  } catch (cause) {
    const error = new HardwareDegradedError(
      `Flight controller at ${endpoint} unavailable: ${describe(cause)}`,
      { cause },
    );
    console.warn("Hardware degraded", { error: error.message });
    return mock();
  }
};
