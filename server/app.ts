import express from "express";
import type { RigSettings } from "./config/env.js";
import { createDataSource, type DataSourceOverrides } from "./instruments/index.js";
import type { DataSource } from "./instruments/source.js";
import { registerMetricsEndpoint } from "./metrics/index.js";
import { RigController } from "./modules/rig/rig-controller.js";
import { CallQueue, RunDriver } from "./modules/rig/run-driver.js";
import { createRigRouter } from "./routes/rig.js";
import { CsvExporter, type RunExporter } from "./services/export/csv-exporter.js";

export type RigApp = {
  app: express.Express;
  controller: RigController;
  queue: CallQueue;
  driver: RunDriver;
  source: DataSource;
};

export type RigAppOptions = {
  source?: DataSource;
  sourceOverrides?: DataSourceOverrides;
  exporter?: RunExporter;
  now?: () => number;
};

/** Wires source, controller, tick driver and HTTP routes from one settings value. */
export function createRigApp(settings: RigSettings, opts: RigAppOptions = {}): RigApp {
  const source = opts.source ?? createDataSource(settings.source.kind, settings, opts.sourceOverrides);
  const controller = new RigController({
    source,
    settings,
    exporter: opts.exporter ?? new CsvExporter(),
    now: opts.now,
  });
  const queue = new CallQueue();
  const driver = new RunDriver(controller, queue, { periodMs: settings.experiment.samplePeriodMs });

  const app = express();
  app.use(express.json());

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok", state: controller.getState(), timestamp: new Date().toISOString() });
  });
  registerMetricsEndpoint(app);
  app.use("/api/rig", createRigRouter({ controller, queue, settings }));

  return { app, controller, queue, driver, source };
}
