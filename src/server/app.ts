/**
 * Express application factory
 *
 * Builds the request pipeline of one worker:
 * access log → concurrency limit → request timeout → routes → errors.
 */

import * as path from "path";
import express, { type Express } from "express";
import type { AppConfig, CatalogRuntime, Logger } from "@/types";
import { STATIC_DIR } from "@/constants";
import * as logger from "@/logger";
import { createConcurrencyLimiter } from "./middleware/concurrencyLimit";
import { requestTimeout } from "./middleware/requestTimeout";
import { requestLogger } from "./middleware/requestLogger";
import { errorHandler, notFound } from "./middleware/errorHandler";
import { healthRouter } from "./routes/health";
import { pagesRouter } from "./routes/pages";
import { apiRouter } from "./routes/api";

export type AppDeps = {
  config: AppConfig;
  catalog: CatalogRuntime;
  log?: Logger;
  /** Directory served under /static (defaults to ./public) */
  staticDir?: string;
};

export function createApp(deps: AppDeps): Express {
  const { config, catalog } = deps;
  const log = deps.log ?? logger.withContext({ pid: process.pid });
  const staticDir = deps.staticDir ?? path.resolve(process.cwd(), STATIC_DIR);

  const app = express();
  app.disable("x-powered-by");

  app.use(requestLogger(log));
  app.use(createConcurrencyLimiter(config.threads));
  app.use(requestTimeout(config.requestTimeoutMs, log));

  app.use(healthRouter(config.catalogPath, log));
  app.use("/static", express.static(staticDir, { fallthrough: true, maxAge: "1h" }));
  app.use(pagesRouter(catalog, config, log));
  app.use("/api", apiRouter(catalog, config.secretKey));

  app.use(notFound);
  app.use(errorHandler(log));

  return app;
}
