/**
 * Service entrypoint: starts the cocktail menu web service
 *
 * The primary process prepares the data directory and schema, then either
 * supervises WORKERS worker processes or, with WORKERS=1, serves in-process.
 * Forked workers re-enter this file and boot a server.
 *
 * Usage:
 *   npm run build && node dist/serverMain.js
 *
 * Environment variables (all optional, see .env.example):
 *   - PORT, HOST: Listen address (default 0.0.0.0:5000)
 *   - WORKERS, THREADS: Worker processes and concurrent requests per worker (2, 2)
 *   - REQUEST_TIMEOUT_MS: Per-request limit (120000)
 *   - CATALOG_PATH: Cocktail dataset (cocktails.yaml)
 *   - DATA_DIR: Writable state directory (data)
 *   - SECRET_KEY, ADMIN_PASSWORD: Session signing key and admin password
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import cluster from "cluster";
import { insecureDefaults, loadConfig } from "./config";
import { loadCatalog } from "./catalog";
import { closeDb, getDbPath, migrateDb, openDb } from "./db";
import { ensureWritableDir } from "./utils/dataDir";
import { runSupervisor } from "./orchestration/supervisor";
import { handleWorkerSignals, runWorker } from "./orchestration/worker";
import * as logger from "./logger";

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  if (cluster.isPrimary) {
    const insecure = insecureDefaults(config);
    if (insecure.length > 0) {
      logger.warn("Using development defaults, set these in production", {
        variables: insecure,
      });
    }

    // Fail before forking when the dataset is broken
    loadCatalog(config.catalogPath);
    ensureWritableDir(config.dataDir);
    migrateDb(openDb(getDbPath(config.dataDir)));
    closeDb();

    if (config.workers > 1) {
      runSupervisor(config);
      return;
    }
  }

  const worker = await runWorker(config);
  handleWorkerSignals(worker);
}

main().catch((err: unknown) => {
  logger.error("Fatal error", logger.errorMeta(err));
  process.exit(1);
});
