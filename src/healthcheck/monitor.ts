/**
 * Health monitor: applies container HEALTHCHECK rules to probe results
 *
 * - Status starts as "starting"
 * - Failures inside the start period do not count, unless a probe has
 *   already succeeded
 * - `retries` consecutive counted failures make the status "unhealthy"
 * - Any success resets the streak and makes the status "healthy"
 */

import type {
  HealthMonitorState,
  Logger,
  ProbeResult,
  ProbeSchedule,
} from "@/types";
import { probeHealth, type RequestFn } from "./probe";

export const INITIAL_MONITOR_STATE: HealthMonitorState = {
  status: "starting",
  failingStreak: 0,
};

/**
 * Next monitor state after a probe
 *
 * @param elapsedMs - Time since the monitored process started
 */
export function recordProbe(
  state: HealthMonitorState,
  result: ProbeResult,
  elapsedMs: number,
  schedule: ProbeSchedule,
): HealthMonitorState {
  if (result.ok) {
    return { status: "healthy", failingStreak: 0 };
  }

  const inStartPeriod = elapsedMs < schedule.startPeriodMs;
  if (inStartPeriod && state.status === "starting") {
    return state;
  }

  const failingStreak = state.failingStreak + 1;
  return {
    status: failingStreak >= schedule.retries ? "unhealthy" : state.status,
    failingStreak,
  };
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true },
    );
  });
}

export type MonitorOptions = {
  url: string;
  schedule: ProbeSchedule;
  log: Logger;
  signal?: AbortSignal;
  request?: RequestFn;
  /** Called after every probe */
  onProbe?: (state: HealthMonitorState, result: ProbeResult) => void;
};

/**
 * Probe on the schedule until aborted, logging status transitions
 *
 * @returns The last state
 */
export async function runMonitor(options: MonitorOptions): Promise<HealthMonitorState> {
  const { url, schedule, log, signal } = options;
  const startedAt = Date.now();
  let state = INITIAL_MONITOR_STATE;

  while (!signal?.aborted) {
    await sleep(schedule.intervalMs, signal);
    if (signal?.aborted) {
      break;
    }

    const result = await probeHealth(url, schedule.timeoutMs, options.request);
    const next = recordProbe(state, result, Date.now() - startedAt, schedule);

    if (!result.ok) {
      log.warn("Health probe failed", {
        url,
        error: result.error,
        failingStreak: next.failingStreak,
      });
    }
    if (next.status !== state.status) {
      const meta = { from: state.status, to: next.status, url };
      if (next.status === "unhealthy") {
        log.error("Service is unhealthy", meta);
      } else {
        log.info("Health status changed", meta);
      }
    }

    state = next;
    options.onProbe?.(state, result);
  }

  return state;
}
