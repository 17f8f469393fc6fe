import { createAlertLog } from "./alerts";
import type { Random } from "./common";
import { clamp, createTicker, uniform, wrapDegrees } from "./common";
import type { SimulationConfiguration } from "./configuration";
import { PreconditionError } from "./errors";
import type { HardwareAdapter } from "./hardware";
import type { BroadcastHub } from "./hub";
import { createLock } from "./lock";
import type {
  Alert,
  DroneState,
  Gps,
  Mission,
  Position,
  Severity,
  TelemetrySample,
  TelemetrySnapshot,
} from "./model";

export type Transition = {
  message: string;
  snapshot: TelemetrySnapshot;
};

export type Simulator = {
  snapshot: () => Promise<TelemetrySnapshot>;
  tick: () => Promise<TelemetrySnapshot>;
  arm: () => Promise<Transition>;
  disarm: () => Promise<Transition>;
  takeoff: (altitude: number) => Promise<Transition>;
  land: () => Promise<Transition>;
  goto: (target: Position) => Promise<Transition>;
  startMission: (waypoints: Position[]) => Promise<Transition>;
  returnHome: () => Promise<Transition>;
  emergencyStop: (reason?: string) => Promise<Transition>;
  start: () => void;
  stop: () => Promise<void>;
};

export type SimulatorOptions = {
  configuration: SimulationConfiguration;
  hardware: HardwareAdapter;
  publish: BroadcastHub["publish"];
  lockTimeout: number;
  random?: Random;
};

/** Flat-earth distance in metres, good enough at waypoint scale. */
export const distance = (from: Position, to: Position) => {
  const north = (to.lat - from.lat) * 111000;
  const east =
    (to.lng - from.lng) * 111000 * Math.cos((from.lat * Math.PI) / 180);
  return Math.hypot(north, east);
};

const toward = (value: number, target: number, step: number) => {
  const delta = target - value;
  return Math.abs(delta) > step ? value + Math.sign(delta) * step : value;
};

export const createSimulator = ({
  configuration,
  hardware,
  publish,
  lockTimeout,
  random = Math.random,
}: SimulatorOptions) => {
  const {
    tickPeriod,
    initialBattery,
    drainRatePerMinute,
    lowBatteryThreshold,
    minimumArmBattery,
    step,
    altitudeStep,
    tolerance,
    altitudeTolerance,
    returnAltitude,
  } = configuration;

  const state: DroneState = {
    armed: false,
    flying: false,
    mode: "DISARMED",
    position: { ...configuration.home },
    home: { ...configuration.home },
    heading: 0,
    speed: 0,
    battery: clamp(initialBattery, 0, 100),
    flightTime: 0,
    mission: undefined,
  };

  const alerts = createAlertLog(50);
  const lock = createLock("drone-state", lockTimeout);
  const controller = new AbortController();
  let ticker: Promise<void> | undefined;
  let gps: Gps | undefined;
  let lowBatteryWarned = false;

  const raise = (
    raised: Alert[],
    message: string,
    severity: Severity,
    type?: string,
  ) => {
    raised.push(alerts.push(message, severity, type));
  };

  const capture = (): TelemetrySnapshot => {
    const { mission } = state;
    return Object.freeze({
      timestamp: new Date().toISOString(),
      armed: state.armed,
      flying: state.flying,
      mode: state.mode,
      position: Object.freeze({ ...state.position }),
      heading: state.heading,
      speed: state.speed,
      battery_pct: state.battery,
      flight_time: state.flightTime,
      mission: mission
        ? Object.freeze({
            cursor: mission.cursor,
            total: mission.waypoints.length,
            active: mission.active,
          })
        : null,
      alerts: Object.freeze(alerts.latest(10).map(_ => Object.freeze(_))),
      gps: gps ? Object.freeze({ ...gps }) : null,
      hardware: hardware.mode,
    });
  };

  const announce = async (raised: Alert[]) => {
    for (const alert of raised) await publish("alerts", alert);
  };

  const touchdown = () => {
    state.flying = false;
    state.position.alt = 0;
    state.speed = 0;
  };

  const approach = (mission: Mission, raised: Alert[], move: boolean) => {
    const target = mission.waypoints[mission.cursor];
    if (!target) return;
    const { position } = state;
    if (move) {
      position.lat = toward(position.lat, target.lat, step);
      position.lng = toward(position.lng, target.lng, step);
      position.alt = toward(position.alt, target.alt, altitudeStep);
    }

    const arrived =
      Math.abs(target.lat - position.lat) < tolerance &&
      Math.abs(target.lng - position.lng) < tolerance &&
      Math.abs(target.alt - position.alt) < altitudeTolerance;
    if (!arrived) return;

    mission.cursor++;
    if (mission.cursor < mission.waypoints.length) return;

    mission.active = false;
    if (mission.returning) {
      touchdown();
      state.mode = "LAND";
      state.mission = undefined;
      raise(raised, "Returned to launch and landed", "info", "rtl_complete");
    } else
      raise(
        raised,
        "Mission completed successfully",
        "info",
        "mission_complete",
      );
  };

  const adopt = (sample: TelemetrySample) => {
    state.position = { ...sample.position };
    if (sample.heading !== undefined)
      state.heading = wrapDegrees(sample.heading);
    if (sample.speed !== undefined) state.speed = sample.speed;
    if (sample.battery !== undefined)
      state.battery = clamp(sample.battery, 0, 100);
  };

  const drift = () => {
    const { position } = state;
    position.lat += uniform(random, -0.00001, 0.00001);
    position.lng += uniform(random, -0.00001, 0.00001);
    position.alt = Math.max(0, position.alt + uniform(random, -0.5, 0.5));
  };

  const drain = () => {
    state.battery = clamp(
      state.battery - (drainRatePerMinute / 60) * (tickPeriod / 1000),
      0,
      100,
    );
  };

  const checkBattery = (raised: Alert[]) => {
    if (!lowBatteryWarned && state.battery < lowBatteryThreshold) {
      lowBatteryWarned = true;
      raise(raised, "Low battery warning", "warning", "low_battery");
    }

    if (state.battery <= 0 && state.flying) {
      touchdown();
      state.mode = "LAND";
      state.mission = undefined;
      raise(
        raised,
        "Battery depleted, forced landing",
        "critical",
        "battery_depleted",
      );
    }
  };

  const advance = (raised: Alert[]) => {
    const sample = hardware.sample();
    if (sample) gps = sample.gps;
    const device = sample?.source === "device" ? sample : undefined;
    if (device) adopt(device);

    if (state.flying) {
      state.flightTime += tickPeriod / 1000;
      const mission = state.mission?.active ? state.mission : undefined;
      if (mission) approach(mission, raised, !device);
      else if (!device) drift();
    }

    if (device?.heading === undefined)
      state.heading = wrapDegrees(state.heading + uniform(random, -2, 2));

    if (device?.speed === undefined) {
      if (!state.flying) state.speed = 0;
      else if (state.mission?.active) state.speed = uniform(random, 5, 15);
      else state.speed = uniform(random, 0, 3);
    }

    if (state.flying) {
      if (device?.battery === undefined) drain();
      checkBattery(raised);
    }
  };

  const tick = async () => {
    const { raised, snapshot } = await lock.run(() => {
      const raised: Alert[] = [];
      advance(raised);
      return { raised, snapshot: capture() };
    });
    await announce(raised);
    await publish("telemetry", snapshot);
    return snapshot;
  };

  const mutate = async (apply: (raised: Alert[]) => string) => {
    const { raised, ...transition } = await lock.run(() => {
      const raised: Alert[] = [];
      const message = apply(raised);
      return { raised, message, snapshot: capture() };
    });
    await announce(raised);
    return transition;
  };

  const requireFlying = (message: string) => {
    if (!state.flying) throw new PreconditionError(message);
  };

  const arm = () =>
    mutate(raised => {
      if (state.mode === "EMERGENCY")
        throw new PreconditionError("Emergency stop active, disarm first");
      if (state.armed) throw new PreconditionError("Drone is already armed");
      if (state.battery < minimumArmBattery)
        throw new PreconditionError("Battery too low to arm");
      state.armed = true;
      state.mode = "ARMED";
      raise(raised, "Drone armed successfully", "info");
      return "Drone armed successfully";
    });

  const disarm = () =>
    mutate(raised => {
      if (state.flying)
        throw new PreconditionError("Cannot disarm while flying");
      state.armed = false;
      state.mode = "DISARMED";
      state.mission = undefined;
      raise(raised, "Drone disarmed", "info");
      return "Drone disarmed successfully";
    });

  const takeoff = (altitude: number) =>
    mutate(raised => {
      if (!state.armed)
        throw new PreconditionError("Drone must be armed first");
      if (state.flying) throw new PreconditionError("Drone is already flying");
      state.home = { ...state.position, alt: 0 };
      state.flying = true;
      state.position.alt = altitude;
      state.mode = "GUIDED";
      raise(raised, `Takeoff to ${altitude}m initiated`, "info");
      return `Taking off to ${altitude}m`;
    });

  const land = () =>
    mutate(raised => {
      requireFlying("Drone is not flying");
      touchdown();
      state.mode = "LAND";
      state.mission = undefined;
      raise(raised, "Landing initiated", "info");
      return "Landing initiated";
    });

  const goto = (target: Position) =>
    mutate(() => {
      requireFlying("Drone must be flying");
      state.mission = {
        waypoints: [{ ...target }],
        cursor: 0,
        active: true,
        returning: false,
      };
      state.mode = "GUIDED";
      const metres = distance(state.position, target);
      return `Navigating to position (distance: ${metres.toFixed(1)}m)`;
    });

  const startMission = (waypoints: Position[]) =>
    mutate(raised => {
      requireFlying("Drone must be flying to start mission");
      if (!waypoints.length)
        throw new PreconditionError("Mission needs at least one waypoint");
      state.mission = {
        waypoints: waypoints.map(_ => ({ ..._ })),
        cursor: 0,
        active: true,
        returning: false,
      };
      state.mode = "GUIDED";
      const message = `Mission started with ${waypoints.length} waypoints`;
      raise(raised, message, "info", "mission_start");
      return message;
    });

  const returnHome = () =>
    mutate(raised => {
      requireFlying("Drone must be flying to return home");
      state.mission = {
        waypoints: [{ ...state.home, alt: returnAltitude }],
        cursor: 0,
        active: true,
        returning: true,
      };
      state.mode = "RTL";
      raise(raised, "Returning to launch position", "info", "rtl");
      return "Returning to launch position";
    });

  const emergencyStop = (reason = "Emergency stop requested") =>
    mutate(raised => {
      touchdown();
      state.armed = false;
      state.mode = "EMERGENCY";
      state.mission = undefined;
      raise(raised, `Emergency stop: ${reason}`, "critical", "emergency_stop");
      return "Emergency stop activated";
    });

  const start = () => {
    if (ticker) return;
    ticker = createTicker(
      "simulator",
      async () => {
        await tick();
      },
      tickPeriod,
      controller.signal,
    ).done;
    console.log("Simulator started", { tickPeriod });
  };

  const stop = async () => {
    controller.abort();
    await ticker;
    console.log("Simulator stopped");
  };

  return {
    snapshot: () => lock.run(capture),
    tick,
    arm,
    disarm,
    takeoff,
    land,
    goto,
    startMission,
    returnHome,
    emergencyStop,
    start,
    stop,
  } satisfies Simulator;
};
