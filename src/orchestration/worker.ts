/**
 * Worker process: serves HTTP requests with its own catalog copy
 *
 * Boot sequence:
 * 1. Load and compile the catalog (fail-fast)
 * 2. Open the shared state database and apply pending migrations
 * 3. Bind the HTTP server
 * 4. Report ready and start heartbeats when running under the supervisor
 */

import cluster from "cluster";
import type { Server } from "http";
import type { AppConfig, WorkerMessage } from "@/types";
import { WORKER_HEARTBEAT_INTERVAL_MS } from "@/constants";
import { loadCatalog } from "@/catalog";
import { closeDb, getDbPath, migrateDb, openDb } from "@/db";
import { createApp } from "@/server/app";
import { boundPort, close, listen } from "@/server/server";
import * as logger from "@/logger";

export type RunningWorker = {
  server: Server;
  port: number;
  stop: () => Promise<void>;
};

function sendToSupervisor(message: WorkerMessage): void {
  cluster.worker?.send(message);
}

/**
 * Boot a worker and serve until stopped
 */
export async function runWorker(config: AppConfig): Promise<RunningWorker> {
  const log = logger.withContext({ pid: process.pid });

  const catalog = loadCatalog(config.catalogPath);
  log.info("Catalog loaded", {
    path: catalog.sourcePath,
    cocktails: catalog.cocktails.length,
    ingredients: catalog.ingredients.length,
  });

  migrateDb(openDb(getDbPath(config.dataDir)));

  const app = createApp({ config, catalog, log });
  const server = await listen(app, config, log);
  const port = boundPort(server);
  log.info("Worker listening", { host: config.host, port, threads: config.threads });

  sendToSupervisor({ type: "ready", port });
  const heartbeat = cluster.isWorker
    ? setInterval(
        () => sendToSupervisor({ type: "heartbeat", at: Date.now() }),
        WORKER_HEARTBEAT_INTERVAL_MS,
      )
    : null;

  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        if (heartbeat) clearInterval(heartbeat);
        await close(server);
        closeDb();
        log.info("Worker stopped");
      })();
    }
    return stopping;
  };

  return { server, port, stop };
}

/**
 * Stop the worker on SIGTERM/SIGINT and exit
 */
export function handleWorkerSignals(worker: RunningWorker): void {
  const shutdown = (signal: string): void => {
    logger.info("Shutdown signal received, closing server", { signal, pid: process.pid });
    worker
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Worker shutdown failed", logger.errorMeta(err));
        process.exit(1);
      });
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}
