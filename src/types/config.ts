/**
 * Service configuration types
 */

import type { LogLevel } from "./logger";

export type AppConfig = {
  port: number;
  host: string;
  /** Number of worker processes forked by the supervisor */
  workers: number;
  /** Maximum concurrent requests per worker */
  threads: number;
  requestTimeoutMs: number;
  /** Absolute path of the cocktail dataset */
  catalogPath: string;
  /** Absolute path of the writable state directory */
  dataDir: string;
  secretKey: string;
  adminPassword: string;
  sessionTtlSeconds: number;
  logLevel: LogLevel;
};
