import type { Express } from "express";
import { collectDefaultMetrics, Counter, Gauge, Registry } from "prom-client";
import { controllerStateSchema, type ControllerState } from "../../shared/rig-schema.js";

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const samplesTotal = new Counter({
  name: "rig_samples_total",
  help: "Processed rig samples",
  registers: [registry],
});

const readFailuresTotal = new Counter({
  name: "rig_read_failures_total",
  help: "Sample reads that ended a run",
  labelNames: ["source"],
  registers: [registry],
});

const runsTotal = new Counter({
  name: "rig_runs_total",
  help: "Completed runs grouped by outcome",
  labelNames: ["outcome"],
  registers: [registry],
});

const stateGauge = new Gauge({
  name: "rig_state",
  help: "1 for the current controller state, 0 otherwise",
  labelNames: ["state"],
  registers: [registry],
});

export const metrics = {
  recordSample(): void {
    samplesTotal.inc();
  },
  recordReadFailure(source: string): void {
    readFailuresTotal.inc({ source });
  },
  recordRun(outcome: "finished" | "error"): void {
    runsTotal.inc({ outcome });
  },
  setState(current: ControllerState): void {
    for (const state of controllerStateSchema.options) {
      stateGauge.set({ state }, state === current ? 1 : 0);
    }
  },
};

export function registerMetricsEndpoint(app: Express): void {
  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", registry.contentType);
    res.send(await registry.metrics());
  });
}
