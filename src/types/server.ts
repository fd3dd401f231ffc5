/**
 * HTTP server and process model type definitions
 */

/**
 * Payload carried by the signed admin session cookie
 */
export type SessionPayload = {
  /** Subject, always "admin" (single shared password) */
  sub: "admin";
  /** Expiry, seconds since epoch */
  exp: number;
};

/**
 * Messages a worker sends to the supervisor over the cluster IPC channel
 */
export type WorkerMessage =
  | { type: "ready"; port: number }
  | { type: "heartbeat"; at: number };

/**
 * Snapshot of a concurrency limiter (per worker)
 */
export type ConcurrencyStats = {
  active: number;
  queued: number;
  limit: number;
};
