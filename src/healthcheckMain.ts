/**
 * Health check entrypoint: used by the image HEALTHCHECK
 *
 * Usage:
 *   node dist/healthcheckMain.js           # one probe, exit 0 (healthy) or 1
 *   node dist/healthcheckMain.js --watch   # probe on the HEALTHCHECK schedule
 *
 * Probes http://localhost:$PORT/health.
 */

import "dotenv/config";
import { loadConfig } from "./config";
import { HEALTH_PATH, HEALTH_PROBE_SCHEDULE } from "./constants";
import { probeHealth, runMonitor } from "./healthcheck";
import * as logger from "./logger";

async function main(): Promise<number> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const url = `http://localhost:${config.port}${HEALTH_PATH}`;

  if (process.argv.includes("--watch")) {
    const controller = new AbortController();
    process.once("SIGINT", () => controller.abort());
    process.once("SIGTERM", () => controller.abort());

    logger.info("Watching service health", { url, ...HEALTH_PROBE_SCHEDULE });
    const state = await runMonitor({
      url,
      schedule: HEALTH_PROBE_SCHEDULE,
      log: logger.withContext({ probe: "watch" }),
      signal: controller.signal,
    });
    return state.status === "unhealthy" ? 1 : 0;
  }

  const result = await probeHealth(url, HEALTH_PROBE_SCHEDULE.timeoutMs);
  if (!result.ok) {
    logger.error("Health check failed", { url, error: result.error });
    return 1;
  }
  logger.debug("Health check passed", { url, durationMs: result.durationMs });
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    logger.error("Health check crashed", logger.errorMeta(err));
    process.exit(1);
  });
