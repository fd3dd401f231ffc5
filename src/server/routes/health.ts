/**
 * Liveness endpoint for the container HEALTHCHECK and orchestrator probes
 */

import * as fs from "fs";
import * as path from "path";
import { Router } from "express";
import type { HealthReport, Logger } from "@/types";
import { SERVICE_NAME } from "@/constants";
import { readCatalogDocument } from "@/catalog";
import { pingDb } from "@/db/connection";

/**
 * Check that the worker can still serve requests: the dataset file is
 * present and parses, and the state database answers.
 */
export function checkHealth(catalogPath: string): HealthReport {
  try {
    if (!fs.existsSync(catalogPath)) {
      return { status: "unhealthy", error: `${path.basename(catalogPath)} not found` };
    }
    readCatalogDocument(catalogPath);
    pingDb();
    return { status: "healthy", service: SERVICE_NAME };
  } catch (err) {
    return {
      status: "unhealthy",
      error: err instanceof Error ? err.message : String(err),
    };
  }
}

export function healthRouter(catalogPath: string, log: Logger): Router {
  const router = Router();

  router.get(["/health", "/healthz"], (_req, res) => {
    const report = checkHealth(catalogPath);
    if (report.status === "unhealthy") {
      log.warn("Health check failed", { error: report.error });
      res.status(503).json(report);
      return;
    }
    res.status(200).json(report);
  });

  return router;
}
