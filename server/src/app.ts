import type { CommandRouter } from "./command";
import { createCommandRouter } from "./command";
import type { Random } from "./common";
import type { Configuration } from "./configuration";
import type { Feeds } from "./feeds";
import { createSyntheticFeeds } from "./feeds";
import type { HardwareAdapter } from "./hardware";
import type { BroadcastHub } from "./hub";
import { createBroadcastHub } from "./hub";
import type { Simulator } from "./simulator";
import { createSimulator } from "./simulator";

export type App = {
  hub: BroadcastHub;
  simulator: Simulator;
  router: CommandRouter;
  hardware: HardwareAdapter;
  start: () => void;
  stop: () => Promise<void>;
};

export type AppOptions = {
  configuration: Configuration;
  hardware: HardwareAdapter;
  random?: Random;
};

export const createApp = ({
  configuration,
  hardware,
  random = Math.random,
}: AppOptions) => {
  const { channels, deliveryTimeout, publishTimeout, lockTimeout } =
    configuration;

  const hub = createBroadcastHub({ channels, deliveryTimeout, publishTimeout });

  const simulator = createSimulator({
    configuration: configuration.simulation,
    hardware,
    publish: hub.publish,
    lockTimeout,
    random,
  });

  const router = createCommandRouter({ simulator, publish: hub.publish });

  const feeds: Feeds | undefined = configuration.syntheticFeeds
    ? createSyntheticFeeds({
        publish: hub.publish,
        videoPeriod: channels.video.period,
        detectionPeriod: configuration.detectionPeriod,
        random,
      })
    : undefined;

  let state: "created" | "running" | "stopped" = "created";

  const start = () => {
    if (state !== "created") return;
    state = "running";
    hub.start();
    simulator.start();
    feeds?.start();
    console.log("Started", { hardware: hardware.mode });
  };

  const stop = async () => {
    if (state === "stopped") return;
    state = "stopped";
    router.close();
    await Promise.all([feeds?.stop(), simulator.stop()]);
    await hub.stop();
    hardware.destroy();
    console.log("Stopped");
  };

  return {
    get hub() {
      return hub;
    },
    get simulator() {
      return simulator;
    },
    get router() {
      return router;
    },
    get hardware() {
      return hardware;
    },
    start,
    stop,
  } satisfies App;
};
