import type { NextFunction, Request, Response } from "express";
import { logger } from "../lib/logger";

// Bodies carry private keys and records, so only the request line is logged.
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startedAt = process.hrtime.bigint();

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const level = res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";
    logger[level]({ method: req.method, path: req.path, status: res.statusCode, durationMs }, "request");
  });

  next();
};
