/**
 * Request timeout middleware
 *
 * Answers 503 when a handler has not responded within the timeout.
 * A handler that blocks the event loop cannot be interrupted from here;
 * the supervisor's heartbeat check replaces such a worker instead.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { Logger } from "@/types";

export function requestTimeout(timeoutMs: number, log: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timer = setTimeout(() => {
      log.error("Request timed out", {
        method: req.method,
        path: req.originalUrl,
        timeoutMs,
      });
      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.status(503).json({ error: "Request timed out" });
    }, timeoutMs);

    const clear = (): void => clearTimeout(timer);
    res.once("finish", clear);
    res.once("close", clear);
    next();
  };
}
