import type { Server } from "http";
import { createRigApp } from "./app.js";
import { readRigSettings } from "./config/env.js";
import { errorMessage } from "./instruments/errors.js";
import { resolveStartupConfig } from "./startup-config.js";

const log = (message: string, source = "express") => {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
};

const settings = readRigSettings(process.env);
const startup = resolveStartupConfig(process.env);
const { app, controller, queue, driver, source } = createRigApp(settings);

let serverInstance: Server | null = null;
let shuttingDown = false;

const requestShutdown = (signal: NodeJS.Signals) => {
  console.error(`[process] signal received: ${signal}`);
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  driver.stop();

  const forceExitTimer = setTimeout(() => {
    console.error("[process] forcing exit after graceful shutdown timeout");
    process.exit(1);
  }, 5000);

  const exit = (code: number) => {
    clearTimeout(forceExitTimer);
    process.exit(code);
  };

  // reset() finalizes an active run, so its samples still reach disk
  queue
    .run(() => controller.reset())
    .catch((err: unknown) => {
      console.error(`[rig] reset during shutdown failed: ${errorMessage(err)}`);
    })
    .finally(() => {
      const server = serverInstance;
      if (!server) {
        exit(0);
        return;
      }
      server.close((err) => {
        if (err) {
          console.error("[process] error while closing server:", err);
          exit(1);
          return;
        }
        exit(0);
      });
    });
};

for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.on(sig, () => requestShutdown(sig));
}

serverInstance = app.listen(startup.port, startup.host, () => {
  log(`serving on ${startup.host}:${startup.port} (source=${source.kind})`);
  if (startup.autoTick) {
    driver.start();
    log(`tick driver every ${settings.experiment.samplePeriodMs}ms`, "rig/driver");
  }
});
