import { createApp } from "./app";
import { fatal } from "./common";
import { loadConfiguration } from "./configuration";
import { probeHardware } from "./hardware";
import { createServer } from "./server";

const main = async () => {
  const configuration = loadConfiguration();

  const hardware = await probeHardware({
    hardware: configuration.hardware,
    base: configuration.simulation.home,
    random: Math.random,
  });

  const app = createApp({ configuration, hardware });
  app.start();

  const server = createServer({
    port: configuration.port,
    hub: app.hub,
    router: app.router,
  });
  await server.listening;

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log("Shutting down", { signal });
    await server.close();
    await app.stop();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const)
    process.once(signal, () => {
      shutdown(signal).catch(fatal);
    });
};

main().catch(fatal);
