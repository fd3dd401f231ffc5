/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { config as loadDotenv } from "dotenv";
import { MIGRATIONS_DIR } from "@/constants";
import * as logger from "@/logger";
import { loadConfig } from "@/config";
import { openDb, closeDb, getDbPath } from "./connection";

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations from the migrations directory
 */
function getPendingMigrations(
  migrationsDir: string,
  appliedMigrations: Set<string>,
): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir);
  } catch (err) {
    logger.warn("Migrations directory not readable", {
      migrationsDir,
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 *
 * The applied check runs inside the same IMMEDIATE transaction, so a
 * migration another process applied since we listed is skipped.
 *
 * @returns false when the migration was already recorded
 */
function applyMigration(
  db: Database.Database,
  migrationsDir: string,
  filename: string,
): boolean {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  const transaction = db.transaction(() => {
    const recorded = db
      .prepare("SELECT 1 FROM schema_migrations WHERE version = ?")
      .get(filename);
    if (recorded) {
      return false;
    }
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
    return true;
  });

  return transaction.immediate();
}

/**
 * Run all pending migrations on an open database.
 *
 * Safe to call from several workers at once.
 *
 * @returns Filenames of the migrations applied by this call
 */
export function migrateDb(
  db: Database.Database,
  migrationsDir: string = join(process.cwd(), MIGRATIONS_DIR),
): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(migrationsDir, getAppliedMigrations(db));
  if (pending.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info("Applying migrations", { count: pending.length });
  const applied: string[] = [];
  for (const migration of pending) {
    if (applyMigration(db, migrationsDir, migration)) {
      logger.info("Applied migration", { migration });
      applied.push(migration);
    }
  }

  return applied;
}

/**
 * Run all pending migrations against the configured state database
 */
export function runMigrations(dataDir?: string): void {
  const db = openDb(getDbPath(dataDir));

  try {
    migrateDb(db);
    logger.info("Migrations complete");
  } finally {
    closeDb();
  }
}

/**
 * CLI entrypoint
 */
if (require.main === module) {
  loadDotenv();
  try {
    runMigrations(loadConfig().dataDir);
  } catch (err) {
    logger.error("Migration failed", logger.errorMeta(err));
    process.exit(1);
  }
}
