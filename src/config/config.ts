/**
 * Service configuration
 *
 * Reads the environment (populated from .env by dotenv at the entrypoints),
 * validates it with zod and resolves paths against the working directory.
 */

import * as path from "path";
import { z } from "zod";
import type { AppConfig } from "@/types";
import {
  DEFAULT_ADMIN_PASSWORD,
  DEFAULT_CATALOG_PATH,
  DEFAULT_DATA_DIR,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SECRET_KEY,
  DEFAULT_SESSION_TTL_SECONDS,
  DEFAULT_THREADS,
  DEFAULT_WORKERS,
} from "@/constants";

/**
 * Error thrown when the environment holds an invalid value.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

// Empty strings count as unset so that `PORT=` in .env falls back to the default
const blankToUndefined = (v: unknown) => (v === "" ? undefined : v);

const intVar = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(min).max(max).default(fallback),
  );

const strVar = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().min(1).default(fallback));

const EnvSchema = z.object({
  PORT: intVar(DEFAULT_PORT, 0, 65535),
  HOST: strVar(DEFAULT_HOST),
  WORKERS: intVar(DEFAULT_WORKERS, 1),
  THREADS: intVar(DEFAULT_THREADS, 1),
  REQUEST_TIMEOUT_MS: intVar(DEFAULT_REQUEST_TIMEOUT_MS, 1),
  CATALOG_PATH: strVar(DEFAULT_CATALOG_PATH),
  DATA_DIR: strVar(DEFAULT_DATA_DIR),
  SECRET_KEY: strVar(DEFAULT_SECRET_KEY),
  ADMIN_PASSWORD: strVar(DEFAULT_ADMIN_PASSWORD),
  SESSION_TTL_SECONDS: intVar(DEFAULT_SESSION_TTL_SECONDS, 1),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === "string" && v !== "" ? v.toLowerCase() : undefined),
    z.enum(["debug", "info", "warn", "error"]).default("info"),
  ),
});

/**
 * Build the service configuration from an environment map.
 *
 * @param env - Environment variables (defaults to process.env)
 * @param cwd - Base directory for relative paths (defaults to process.cwd())
 * @throws {ConfigError} Naming the first offending variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue.path.join(".") || "environment";
    throw new ConfigError(`${variable}: ${issue.message}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    workers: vars.WORKERS,
    threads: vars.THREADS,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    catalogPath: path.resolve(cwd, vars.CATALOG_PATH),
    dataDir: path.resolve(cwd, vars.DATA_DIR),
    secretKey: vars.SECRET_KEY,
    adminPassword: vars.ADMIN_PASSWORD,
    sessionTtlSeconds: vars.SESSION_TTL_SECONDS,
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * Names of secrets still set to their development fallbacks
 */
export function insecureDefaults(config: AppConfig): string[] {
  const names: string[] = [];
  if (config.secretKey === DEFAULT_SECRET_KEY) names.push("SECRET_KEY");
  if (config.adminPassword === DEFAULT_ADMIN_PASSWORD) names.push("ADMIN_PASSWORD");
  return names;
}
