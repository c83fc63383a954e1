import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { z } from "zod";
import {
  checklistUpdateSchema,
  experimentConfigSchema,
  servoCommandSchema,
} from "../../shared/rig-schema.js";
import type { RigSettings } from "../config/env.js";
import { ResourceError, RigValidationError } from "../instruments/errors.js";
import type { RigController } from "../modules/rig/rig-controller.js";
import type { CallQueue } from "../modules/rig/run-driver.js";

type RigRouterDeps = {
  controller: RigController;
  queue: CallQueue;
  settings: RigSettings;
};

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
});

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

const guard =
  (handler: AsyncHandler): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

export function createRigRouter({ controller, queue, settings }: RigRouterDeps): express.Router {
  const router = express.Router();

  router.get("/state", (_req, res) => {
    res.json(controller.getStatus());
  });

  router.get("/settings", (_req, res) => {
    res.json({
      servo: settings.servo,
      duration: {
        minS: settings.experiment.minDurationS,
        maxS: settings.experiment.maxDurationS,
      },
      samplePeriodMs: settings.experiment.samplePeriodMs,
      operatingRange: settings.operatingRange,
      defaultOutputPath: settings.output.defaultPath,
    });
  });

  router.get("/history", (req, res) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: "invalid-history-query", details: parsed.error.flatten() });
      return;
    }
    const history = controller.getHistory();
    const limit = parsed.data.limit;
    const samples = limit === undefined ? history : history.slice(Math.max(0, history.length - limit));
    res.json({ total: history.length, samples });
  });

  router.post(
    "/checklist",
    guard(async (req, res) => {
      const parsed = checklistUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "invalid-checklist", details: parsed.error.flatten() });
        return;
      }
      await queue.run(() => controller.setChecklist(parsed.data.ok));
      res.json(controller.getStatus());
    }),
  );

  router.post(
    "/start",
    guard(async (req, res) => {
      const parsed = experimentConfigSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "invalid-experiment-config", details: parsed.error.flatten() });
        return;
      }
      await queue.run(() => controller.startExperiment(parsed.data));
      res.json(controller.getStatus());
    }),
  );

  router.post(
    "/stop",
    guard(async (_req, res) => {
      await queue.run(() => controller.stopExperiment());
      res.json(controller.getStatus());
    }),
  );

  router.post(
    "/servo",
    guard(async (req, res) => {
      const parsed = servoCommandSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "invalid-servo", details: parsed.error.flatten() });
        return;
      }
      await queue.run(() => controller.setServoAngle(parsed.data.deg));
      res.json(controller.getStatus());
    }),
  );

  router.post(
    "/servo/preview",
    guard(async (req, res) => {
      const parsed = servoCommandSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "invalid-servo", details: parsed.error.flatten() });
        return;
      }
      await queue.run(() => controller.previewServoAngle(parsed.data.deg));
      res.json(controller.getStatus());
    }),
  );

  router.post(
    "/reset",
    guard(async (_req, res) => {
      await queue.run(() => controller.reset());
      res.json(controller.getStatus());
    }),
  );

  router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof RigValidationError) {
      res.status(err.status).json({ error: err.name, message: err.message });
      return;
    }
    if (err instanceof ResourceError) {
      console.warn(`[rig] data source unavailable: ${err.message}`);
      res.status(503).json({ error: err.name, message: err.message });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[rig] request failed: ${message}`);
    res.status(500).json({ error: "rig-failure", message });
  });

  return router;
}
