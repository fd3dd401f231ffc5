/**
 * Worker liveness bookkeeping shared by supervisor and workers
 */

import type { WorkerMessage } from "@/types";
import { WORKER_HEARTBEAT_INTERVAL_MS } from "@/constants";

/**
 * Type guard for messages received over the cluster IPC channel
 */
export function isWorkerMessage(value: unknown): value is WorkerMessage {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }
  if (value.type === "ready") {
    return "port" in value && typeof value.port === "number";
  }
  if (value.type === "heartbeat") {
    return "at" in value && typeof value.at === "number";
  }
  return false;
}

/**
 * Workers whose last heartbeat is older than the timeout
 *
 * @param lastSeen - Last heartbeat time (ms) per worker id
 * @returns Ids of stale workers, in map order
 */
export function findStaleWorkers(
  lastSeen: ReadonlyMap<number, number>,
  nowMs: number,
  timeoutMs: number,
): number[] {
  const stale: number[] = [];
  for (const [id, seenAt] of lastSeen) {
    if (nowMs - seenAt > timeoutMs) {
      stale.push(id);
    }
  }
  return stale;
}

/**
 * Silence after which a worker counts as stuck
 *
 * The request timeout, but never less than two heartbeat intervals so a
 * short timeout cannot flag a worker whose next heartbeat is not yet due.
 */
export function heartbeatStaleLimitMs(requestTimeoutMs: number): number {
  return Math.max(requestTimeoutMs, 2 * WORKER_HEARTBEAT_INTERVAL_MS);
}
