/**
 * State storage constants
 */

/**
 * Default writable state directory, relative to the working directory
 */
export const DEFAULT_DATA_DIR = "data";

/**
 * SQLite file inside the data directory
 */
export const STATE_DB_FILENAME = "state.db";

/**
 * Directory with SQL migrations, relative to the working directory
 */
export const MIGRATIONS_DIR = "migrations";
