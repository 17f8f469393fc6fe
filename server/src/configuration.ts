import type { ChannelName, Position } from "./model";

export type OverflowPolicy = "drop-newest" | "drop-oldest" | "block";

export type ChannelConfiguration = {
  capacity: number;
  /** Delay between loop iterations in ms. 0 means event-driven. */
  period: number;
  overflow: OverflowPolicy;
};

export type SimulationConfiguration = {
  tickPeriod: number;
  initialBattery: number;
  drainRatePerMinute: number;
  lowBatteryThreshold: number;
  minimumArmBattery: number;
  /** Degrees moved per tick on each horizontal axis. */
  step: number;
  /** Metres climbed or descended per tick. */
  altitudeStep: number;
  /** Waypoint reached once every horizontal delta is under this, in degrees. */
  tolerance: number;
  altitudeTolerance: number;
  home: Position;
  returnAltitude: number;
};

export type HardwareConfiguration = {
  /**
   * `tcp://host:port` or `ws://host:port/path`. Unset selects mock telemetry.
   */
  endpoint: string | undefined;
  connectTimeout: number;
  staleTimeout: number;
  pollPeriod: number;
};

export type Configuration = {
  port: number;
  simulation: SimulationConfiguration;
  hardware: HardwareConfiguration;
  channels: Record<ChannelName, ChannelConfiguration>;
  deliveryTimeout: number;
  publishTimeout: number;
  lockTimeout: number;
  syntheticFeeds: boolean;
  /** Delay between synthetic detection batches in ms. */
  detectionPeriod: number;
};

export const defaultConfiguration: Configuration = {
  port: 5001,
  simulation: {
    tickPeriod: 1000,
    initialBattery: 100,
    drainRatePerMinute: 0.1,
    lowBatteryThreshold: 20,
    minimumArmBattery: 15,
    step: 0.00005,
    altitudeStep: 1,
    tolerance: 0.0001,
    altitudeTolerance: 2,
    home: { lat: 33.6844, lng: 73.0479, alt: 0 },
    returnAltitude: 10,
  },
  hardware: {
    endpoint: undefined,
    connectTimeout: 10000,
    staleTimeout: 5000,
    pollPeriod: 100,
  },
  channels: {
    telemetry: { capacity: 100, period: 100, overflow: "drop-newest" },
    video: { capacity: 10, period: 1000 / 30, overflow: "drop-newest" },
    detections: { capacity: 50, period: 100, overflow: "drop-newest" },
    alerts: { capacity: 20, period: 0, overflow: "block" },
  },
  deliveryTimeout: 2000,
  publishTimeout: 1000,
  lockTimeout: 30000,
  syntheticFeeds: true,
  detectionPeriod: 1000,
};

type Environment = Record<string, string | undefined>;

const number = (env: Environment, key: string, fallback: number) => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn("Ignoring invalid configuration value", { key, raw });
    return fallback;
  }
  return value;
};

const flag = (env: Environment, key: string, fallback: boolean) => {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  console.warn("Ignoring invalid configuration value", { key, raw });
  return fallback;
};

export const loadConfiguration = (
  env: Environment = process.env,
): Configuration => {
  const { simulation, hardware } = defaultConfiguration;
  return {
    ...defaultConfiguration,
    port: number(env, "PORT", defaultConfiguration.port),
    simulation: {
      ...simulation,
      tickPeriod: number(env, "TICK_PERIOD_MS", simulation.tickPeriod),
      initialBattery: number(env, "INITIAL_BATTERY", simulation.initialBattery),
      drainRatePerMinute: number(
        env,
        "BATTERY_DRAIN_PER_MINUTE",
        simulation.drainRatePerMinute,
      ),
      home: {
        lat: number(env, "HOME_LAT", simulation.home.lat),
        lng: number(env, "HOME_LNG", simulation.home.lng),
        alt: number(env, "HOME_ALT", simulation.home.alt),
      },
      returnAltitude: number(env, "RTL_ALTITUDE", simulation.returnAltitude),
    },
    hardware: {
      ...hardware,
      endpoint: env.MAVLINK_ENDPOINT?.trim() || undefined,
      connectTimeout: number(
        env,
        "MAVLINK_CONNECT_TIMEOUT_MS",
        hardware.connectTimeout,
      ),
      staleTimeout: number(
        env,
        "MAVLINK_STALE_TIMEOUT_MS",
        hardware.staleTimeout,
      ),
    },
    syntheticFeeds: flag(
      env,
      "SYNTHETIC_FEEDS",
      defaultConfiguration.syntheticFeeds,
    ),
    detectionPeriod: number(
      env,
      "DETECTION_PERIOD_MS",
      defaultConfiguration.detectionPeriod,
    ),
  };
};
