/**
 * Supervisor: primary process managing the worker pool
 *
 * Key responsibilities:
 * - Fork the configured number of workers
 * - Replace workers that exit unexpectedly
 * - Kill and replace workers whose heartbeat is older than the request
 *   timeout (a handler stuck on the event loop)
 * - Give up after repeated boot failures (e.g. an invalid catalog)
 * - Forward SIGINT/SIGTERM to workers and exit once they are gone
 *
 * Decisions live in poolPolicy.ts; this file performs them.
 */

import cluster, { type Worker } from "cluster";
import type { AppConfig } from "@/types";
import {
  WORKER_SHUTDOWN_GRACE_MS,
  WORKER_STALE_CHECK_INTERVAL_MS,
} from "@/constants";
import * as logger from "@/logger";
import { findStaleWorkers, heartbeatStaleLimitMs, isWorkerMessage } from "./heartbeat";
import {
  graceTimeoutExitCode,
  INITIAL_POOL_STATE,
  MAX_BOOT_FAILURES,
  onShutdownRequest,
  onWorkerExit,
  onWorkerReady,
  type PoolState,
} from "./poolPolicy";

export function runSupervisor(config: AppConfig): void {
  const live = new Map<number, Worker>();
  const lastSeen = new Map<number, number>();
  const ready = new Set<number>();
  const staleLimitMs = heartbeatStaleLimitMs(config.requestTimeoutMs);
  let state: PoolState = INITIAL_POOL_STATE;

  const fork = (): Worker => {
    const worker = cluster.fork();
    live.set(worker.id, worker);
    lastSeen.set(worker.id, Date.now());
    logger.info("Worker forked", { workerId: worker.id, pid: worker.process.pid });
    return worker;
  };

  const staleCheck = setInterval(() => {
    const stale = findStaleWorkers(lastSeen, Date.now(), staleLimitMs);
    for (const id of stale) {
      const worker = live.get(id);
      lastSeen.delete(id);
      if (worker) {
        logger.error("Worker heartbeat timed out, killing", {
          workerId: id,
          pid: worker.process.pid,
          staleLimitMs,
        });
        worker.process.kill("SIGKILL");
      }
    }
  }, WORKER_STALE_CHECK_INTERVAL_MS);

  const shutdown = (reason: string, code: number): void => {
    const transition = onShutdownRequest(state, code, live.size);
    if (transition.action.type === "exit" && state.shuttingDown) {
      logger.warn("Forced shutdown - exiting immediately");
      process.exit(transition.action.code);
    }
    state = transition.state;
    clearInterval(staleCheck);
    logger.info("Stopping workers", { reason });

    if (transition.action.type === "exit") {
      process.exit(transition.action.code);
    }
    for (const worker of live.values()) {
      worker.process.kill("SIGTERM");
    }

    setTimeout(() => {
      logger.warn("Workers did not stop in time, killing");
      for (const worker of live.values()) {
        worker.process.kill("SIGKILL");
      }
      process.exit(graceTimeoutExitCode(state));
    }, WORKER_SHUTDOWN_GRACE_MS).unref();
  };

  cluster.on("message", (worker, message: unknown) => {
    if (!isWorkerMessage(message)) {
      return;
    }
    lastSeen.set(worker.id, Date.now());
    if (message.type === "ready") {
      ready.add(worker.id);
      state = onWorkerReady(state);
      logger.info("Worker ready", { workerId: worker.id, port: message.port });
    }
  });

  cluster.on("exit", (worker, code, signal) => {
    live.delete(worker.id);
    lastSeen.delete(worker.id);
    const booted = ready.delete(worker.id);

    const transition = onWorkerExit(state, booted, live.size);
    state = transition.state;

    switch (transition.action.type) {
      case "wait":
        logger.info("Worker exited", { workerId: worker.id, code, signal });
        return;
      case "exit":
        logger.info("All workers stopped, exiting", { workerId: worker.id });
        process.exit(transition.action.code);
        return;
      case "give-up":
        logger.error("Workers keep failing to boot, shutting down", {
          bootFailures: state.bootFailures,
          maxBootFailures: MAX_BOOT_FAILURES,
        });
        shutdown("boot-failure", 1);
        return;
      case "respawn":
        logger.warn("Worker exited unexpectedly", { workerId: worker.id, code, signal });
        fork();
        return;
    }
  });

  process.on("SIGINT", () => shutdown("SIGINT", 0));
  process.on("SIGTERM", () => shutdown("SIGTERM", 0));

  logger.info("Supervisor started", {
    pid: process.pid,
    workers: config.workers,
    threads: config.threads,
    timeoutMs: config.requestTimeoutMs,
  });
  for (let i = 0; i < config.workers; i++) {
    fork();
  }
}
