/**
 * Access log middleware: one line per finished response
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "@/types";

/**
 * Paths hit by probes every few seconds; logged at debug to keep logs readable
 */
const QUIET_PATHS = new Set(["/health", "/healthz"]);

export function requestLogger(log: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = process.hrtime.bigint();

    res.once("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const meta = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10,
      };
      if (QUIET_PATHS.has(req.path)) {
        log.debug("Request handled", meta);
      } else {
        log.info("Request handled", meta);
      }
    });

    next();
  };
}
