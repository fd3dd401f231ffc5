/**
 * Container health probe constants
 *
 * Same schedule as the image HEALTHCHECK instruction.
 */

import type { ProbeSchedule } from "@/types";

export const HEALTH_PROBE_SCHEDULE: ProbeSchedule = {
  intervalMs: 30_000,
  timeoutMs: 3_000,
  startPeriodMs: 5_000,
  retries: 3,
};

export const HEALTH_PATH = "/health";
