import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import { log } from "../utils/logger.js";

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = randomUUID();
  const start = Date.now();

  res.setHeader("x-request-id", requestId);

  res.on("finish", () => {
    log(`[http] ${requestId} | ${req.method} ${req.path} | status=${res.statusCode} | ${Date.now() - start}ms`);
  });

  next();
};
