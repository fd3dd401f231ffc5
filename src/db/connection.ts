/**
 * SQLite database connection
 *
 * Manages the state database lifecycle. Each worker process opens its own
 * connection to the same file; WAL mode plus a busy timeout lets them
 * write concurrently without stepping on each other.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { DEFAULT_DATA_DIR, STATE_DB_FILENAME } from "@/constants";

/**
 * How long a writer waits for another process's lock before failing
 */
const BUSY_TIMEOUT_MS = 5_000;

let db: Database.Database | null = null;

/**
 * Database file path for a data directory
 */
export function getDbPath(dataDir: string = join(process.cwd(), DEFAULT_DATA_DIR)): string {
  return join(dataDir, STATE_DB_FILENAME);
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath: string = getDbPath()): Database.Database {
  if (db) {
    return db;
  }

  // Ensure parent directory exists (skip for :memory:)
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);

  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

  // WAL mode so readers never block the writer
  db.pragma("journal_mode = WAL");

  return db;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Cheap liveness query used by the health check
 */
export function pingDb(): void {
  getDb().prepare("SELECT 1").get();
}

/**
 * Set database connection for testing purposes only.
 * This allows injecting a test database into the singleton.
 *
 * @internal Test use only - do not use in production code
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
