/**
 * Health check type definitions
 */

/**
 * Body of GET /health
 */
export type HealthReport =
  | { status: "healthy"; service: string }
  | { status: "unhealthy"; error: string };

/**
 * Container probe schedule
 */
export type ProbeSchedule = {
  intervalMs: number;
  timeoutMs: number;
  startPeriodMs: number;
  retries: number;
};

export type HealthStatus = "starting" | "healthy" | "unhealthy";

/**
 * Probe bookkeeping, mirrors how a container runtime tracks HEALTHCHECK results
 */
export type HealthMonitorState = {
  status: HealthStatus;
  /** Consecutive failures counted outside the start period */
  failingStreak: number;
};

/**
 * Outcome of a single probe
 */
export type ProbeResult =
  | { ok: true; durationMs: number }
  | { ok: false; durationMs: number; error: string };
