import { createServer, type Server } from "node:http";
import cors from "cors";
import express, { Router, type Express, type Request, type Response } from "express";
import { z } from "zod";
import { describeError, log, logError } from "../utils/logger.js";
import { summarizeAccount } from "./account-summary.js";
import { requestLogger } from "./request-logger.js";
import type { ControlSurface } from "./surface.js";

const emergencyStopSchema = z
  .object({
    reason: z.string().trim().min(1).max(500),
    actor: z.enum(["dashboard", "operator"]).default("dashboard"),
  })
  .strict();

function respond(res: Response, read: () => unknown): void {
  try {
    res.json(read());
  } catch (error) {
    logError("Control surface read failed", error);
    res.status(500).json({ error: describeError(error) });
  }
}

export function createControlRouter(surface: ControlSurface): Router {
  const router = Router();

  // Degraded and stopped are reported in the body; 503 means the read itself failed.
  router.get("/health", (_req: Request, res: Response) => {
    try {
      res.json(surface.getHealth());
    } catch (error) {
      logError("Health read failed", error);
      res.status(503).json({ status: "DEGRADED", error: describeError(error) });
    }
  });

  router.get("/metrics", (_req, res) => respond(res, () => surface.getMetrics()));
  router.get("/accounts", (_req, res) => respond(res, () => surface.listAccounts().map(summarizeAccount)));
  router.get("/config", (_req, res) => respond(res, () => surface.getConfig()));
  router.get("/qualified-stocks", (_req, res) => respond(res, () => surface.listCandidates()));
  router.get("/report", (_req, res) => respond(res, () => surface.getDailyReport()));

  router.post("/emergency-stop", (req: Request, res: Response) => {
    const parsed = emergencyStopSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      res.status(400).json({ error: `${issue.path.join(".") || "body"}: ${issue.message}` });
      return;
    }
    const ack = surface.triggerEmergencyStop(parsed.data.reason, parsed.data.actor);
    res.status(202).json(ack);
  });

  return router;
}

export function createHttpApp(surface: ControlSurface): Express {
  const app = express();

  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST"],
    })
  );
  app.use(requestLogger);
  app.use(express.json());
  app.use(createControlRouter(surface));

  return app;
}

export function startHttpServer(app: Express, port: number, host: string): Promise<Server> {
  const server = createServer(app);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      log(`Control surface listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}

export function stopHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
