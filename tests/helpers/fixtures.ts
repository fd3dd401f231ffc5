/**
 * Shared test fixtures: a small catalog and a config pointing at temp paths
 */

import { join } from "path";
import { tmpdir } from "os";
import type { AppConfig, CatalogRuntime, CocktailRaw } from "@/types";
import { compileCatalog } from "@/catalog";

export const TEST_COCKTAILS: CocktailRaw[] = [
  {
    name: "Mojito",
    ingredients: [
      { name: "White rum", qty: 50, unit: "ml" },
      { name: "Lime juice", qty: 25, unit: "ml" },
      { name: "Mint", qty: "12 leaves" },
    ],
  },
  {
    name: "Daiquiri",
    ingredients: [
      { name: "White rum", qty: 60, unit: "ml" },
      { name: "Lime juice", qty: 25, unit: "ml" },
    ],
  },
  {
    name: "Gin Tonic",
    ingredients: [
      { name: "Gin", qty: 50, unit: "ml" },
      { name: "Tonic water", qty: 150, unit: "ml" },
    ],
  },
  {
    name: "Virgin Fizz",
    ingredients: [
      { name: "Lime juice", qty: 30, unit: "ml" },
      { name: "Soda water", qty: "top" },
    ],
  },
];

/**
 * Compile a fresh (frozen) copy of the given cocktails
 */
export function createTestCatalog(
  cocktails: CocktailRaw[] = TEST_COCKTAILS,
  sourcePath = "/nonexistent/cocktails.yaml",
): CatalogRuntime {
  // compileCatalog freezes in place
  return compileCatalog({ cocktails: structuredClone(cocktails) }, sourcePath);
}

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    host: "127.0.0.1",
    workers: 1,
    threads: 2,
    requestTimeoutMs: 120_000,
    catalogPath: "/nonexistent/cocktails.yaml",
    dataDir: join(tmpdir(), "cocktail-menu-tests"),
    secretKey: "test-secret",
    adminPassword: "test-password",
    sessionTtlSeconds: 3600,
    logLevel: "error",
    ...overrides,
  };
}

/**
 * Logger that records calls instead of printing
 */
export function createRecordingLogger() {
  const entries: { level: string; message: string; meta?: Record<string, unknown> }[] = [];
  const record =
    (level: string) => (message: string, meta?: Record<string, unknown>) => {
      entries.push({ level, message, meta });
    };
  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}
