/**
 * Final error handling middleware
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import type { Logger } from "@/types";
import { errorMeta } from "@/logger";
import { ApiError } from "../apiError";

type BodyParserError = Error & { type: string; status: number };

/**
 * Errors raised by express.json()/urlencoded() carry a `type` and `status`
 */
function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}

/**
 * 404 for anything no route matched
 */
export function notFound(_req: Request, _res: Response, next: NextFunction): void {
  next(new ApiError(404, "Not found"));
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ApiError) {
      res.status(err.status).json({ error: err.message });
      return;
    }

    if (isBodyParserError(err)) {
      if (err.type === "entity.parse.failed") {
        res.status(400).json({ error: "Invalid JSON body" });
        return;
      }
      if (err.status >= 400 && err.status < 500) {
        res.status(err.status).json({ error: err.message });
        return;
      }
    }

    log.error("Unhandled request error", {
      method: req.method,
      path: req.originalUrl,
      ...errorMeta(err),
    });
    res.status(500).json({ error: "Internal server error" });
  };
}
