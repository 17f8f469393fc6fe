export type Position = { lat: number; lng: number; alt: number };

export type Mode =
  | "DISARMED"
  | "ARMED"
  | "GUIDED"
  | "RTL"
  | "LAND"
  | "EMERGENCY";

export type Severity = "info" | "warning" | "critical";

export type Alert = {
  id: number;
  message: string;
  severity: Severity;
  type: string;
  timestamp: string;
};

export type Mission = {
  waypoints: Position[];
  cursor: number;
  active: boolean;
  /** Set for return-to-launch missions, which land on completion. */
  returning: boolean;
};

export type DroneState = {
  armed: boolean;
  flying: boolean;
  mode: Mode;
  position: Position;
  home: Position;
  heading: number;
  speed: number;
  battery: number;
  flightTime: number;
  mission: Mission | undefined;
};

export type HardwareMode = "device" | "mock";

export type Gps = { satellites: number; fix: number };

export type TelemetrySample = {
  source: HardwareMode;
  time: number;
  position: Position;
  heading?: number;
  speed?: number;
  battery?: number;
  gps: Gps;
};

/** Fix handed over by the GPS receiver layer. */
export type GpsFix = {
  lat: number;
  lng: number;
  altitude: number;
  satellites: number;
  timestamp: number;
};

export type MissionProgress = {
  cursor: number;
  total: number;
  active: boolean;
};

export type TelemetrySnapshot = {
  readonly timestamp: string;
  readonly armed: boolean;
  readonly flying: boolean;
  readonly mode: Mode;
  readonly position: Readonly<Position>;
  readonly heading: number;
  readonly speed: number;
  readonly battery_pct: number;
  readonly flight_time: number;
  readonly mission: Readonly<MissionProgress> | null;
  readonly alerts: readonly Readonly<Alert>[];
  readonly gps: Readonly<Gps> | null;
  readonly hardware: HardwareMode;
};

export const channelNames = [
  "telemetry",
  "video",
  "detections",
  "alerts",
] as const;

export type ChannelName = (typeof channelNames)[number];

export type VideoFrame = {
  frame: string;
  format: "jpeg";
  sequence: number;
  timestamp: string;
};

export type Detection = {
  label: string;
  confidence: number;
  bbox: [x: number, y: number, width: number, height: number];
};

export type DetectionBatch = {
  detections: Detection[];
  count: number;
  timestamp: string;
};

export type ChannelMessages = {
  telemetry: TelemetrySnapshot;
  video: VideoFrame;
  detections: DetectionBatch;
  alerts: Alert;
};

export type Command =
  | { command: "arm" }
  | { command: "disarm" }
  | { command: "takeoff"; altitude: number }
  | { command: "land" }
  | { command: "goto"; target: Position }
  | { command: "start_mission"; waypoints: Position[] }
  | { command: "return_home" }
  | { command: "emergency_stop"; reason: string | undefined };

export type CommandName = Command["command"];

export type CommandResponse = {
  success: boolean;
  message: string;
  timestamp: string;
};
