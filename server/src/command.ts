import type { CommandError } from "./errors";
import { PreconditionError, ValidationError } from "./errors";
import type { BroadcastHub } from "./hub";
import type { Command, CommandName, CommandResponse, Position } from "./model";
import type { Simulator, Transition } from "./simulator";

export type Ack = {
  command: CommandName;
  message: string;
  timestamp: string;
};

export type CommandResult =
  | { success: true; ack: Ack }
  | { success: false; command: string; error: CommandError; timestamp: string };

export type CommandRouter = {
  execute: (command: string, params?: unknown) => Promise<CommandResult>;
  close: () => void;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const coordinate = (
  params: Record<string, unknown>,
  keys: string[],
  path: string,
  [min, max]: [number, number],
  fallback?: number,
) => {
  const key = keys.find(_ => params[_] !== undefined);
  const raw = key === undefined ? undefined : params[key];
  if (raw === undefined) {
    if (fallback !== undefined) return fallback;
    throw new ValidationError(`Missing ${path}`);
  }
  const value =
    typeof raw === "number"
      ? raw
      : typeof raw === "string" && raw.trim() !== ""
        ? Number(raw)
        : NaN;
  if (!Number.isFinite(value))
    throw new ValidationError(`Invalid ${path}: expected a number`);
  if (value < min || value > max)
    throw new ValidationError(`${path} must be between ${min} and ${max}`);
  return value;
};

const latitude: [number, number] = [-90, 90];
const longitude: [number, number] = [-180, 180];
const altitude: [number, number] = [1, 100];

const position = (
  params: Record<string, unknown>,
  prefix = "",
  fallbackAltitude?: number,
): Position => ({
  lat: coordinate(params, ["lat", "latitude"], `${prefix}lat`, latitude),
  lng: coordinate(
    params,
    ["lng", "lon", "longitude"],
    `${prefix}lng`,
    longitude,
  ),
  alt: coordinate(
    params,
    ["alt", "altitude"],
    `${prefix}alt`,
    altitude,
    fallbackAltitude,
  ),
});

/**
 * Checks shape and ranges of a raw command. Throws {@link ValidationError}.
 */
export const parseCommand = (name: string, params: unknown = {}): Command => {
  if (!isRecord(params))
    throw new ValidationError("Command params must be an object");

  switch (name) {
    case "arm":
    case "disarm":
    case "land":
    case "return_home":
      return { command: name };
    case "takeoff":
      return {
        command: name,
        altitude: coordinate(
          params,
          ["altitude", "alt"],
          "altitude",
          altitude,
          10,
        ),
      };
    case "goto":
      return { command: name, target: position(params, "", 10) };
    case "start_mission": {
      const { waypoints } = params;
      if (!Array.isArray(waypoints) || !waypoints.length)
        throw new ValidationError("waypoints must be a non-empty array");
      return {
        command: name,
        waypoints: waypoints.map((waypoint: unknown, i) => {
          if (!isRecord(waypoint))
            throw new ValidationError(`waypoints[${i}] must be an object`);
          return position(waypoint, `waypoints[${i}].`);
        }),
      };
    }
    case "emergency_stop": {
      const { reason } = params;
      if (reason === undefined) return { command: name, reason: undefined };
      if (typeof reason !== "string")
        throw new ValidationError("reason must be a string");
      return { command: name, reason };
    }
    default:
      throw new ValidationError(`Unknown command: ${name}`);
  }
};

export const respond = (result: CommandResult): CommandResponse =>
  result.success
    ? {
        success: true,
        message: result.ack.message,
        timestamp: result.ack.timestamp,
      }
    : {
        success: false,
        message: result.error.message,
        timestamp: result.timestamp,
      };

export type CommandRouterOptions = {
  simulator: Simulator;
  publish: BroadcastHub["publish"];
};

export const createCommandRouter = ({
  simulator,
  publish,
}: CommandRouterOptions) => {
  let closed = false;

  const dispatch = (command: Command): Promise<Transition> => {
    switch (command.command) {
      case "arm":
        return simulator.arm();
      case "disarm":
        return simulator.disarm();
      case "takeoff":
        return simulator.takeoff(command.altitude);
      case "land":
        return simulator.land();
      case "goto":
        return simulator.goto(command.target);
      case "start_mission":
        return simulator.startMission(command.waypoints);
      case "return_home":
        return simulator.returnHome();
      case "emergency_stop":
        return simulator.emergencyStop(command.reason);
    }
  };

  const reject = (command: string, error: CommandError): CommandResult => {
    console.warn("Command rejected", {
      command,
      error: error.name,
      message: error.message,
    });
    return {
      success: false,
      command,
      error,
      timestamp: new Date().toISOString(),
    };
  };

  const execute = async (
    name: string,
    params?: unknown,
  ): Promise<CommandResult> => {
    if (closed)
      return reject(
        name,
        new PreconditionError("Shutting down, command rejected"),
      );

    let command: Command;
    try {
      command = parseCommand(name, params);
    } catch (error) {
      if (error instanceof ValidationError) return reject(name, error);
      throw error;
    }

    try {
      const { message, snapshot } = await dispatch(command);
      await publish("telemetry", snapshot);
      console.log("Command executed", { command: name, message });
      return {
        success: true,
        ack: {
          command: command.command,
          message,
          timestamp: new Date().toISOString(),
        },
      };
    } catch (error) {
      if (error instanceof PreconditionError) return reject(name, error);
      throw error;
    }
  };

  return {
    execute,
    close: () => {
      closed = true;
    },
  } satisfies CommandRouter;
};
