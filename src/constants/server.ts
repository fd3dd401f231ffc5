/**
 * HTTP server and process model constants
 */

export const SERVICE_NAME = "cocktail-menu";

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = "0.0.0.0";

/**
 * Worker processes forked by the supervisor
 */
export const DEFAULT_WORKERS = 2;

/**
 * Concurrent requests served by one worker
 */
export const DEFAULT_THREADS = 2;

/**
 * Per-request processing limit (2 minutes)
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

/**
 * How often a worker reports liveness to the supervisor
 */
export const WORKER_HEARTBEAT_INTERVAL_MS = 5_000;

/**
 * How often the supervisor scans for stale workers
 */
export const WORKER_STALE_CHECK_INTERVAL_MS = 1_000;

/**
 * Time given to workers to close their servers on shutdown
 */
export const WORKER_SHUTDOWN_GRACE_MS = 10_000;

/**
 * Directory with CSS/JS served under /static, relative to the working directory
 */
export const STATIC_DIR = "public";

/**
 * Largest JSON body accepted by the API
 */
export const JSON_BODY_LIMIT = "16kb";
