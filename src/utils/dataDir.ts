/**
 * State directory helpers
 */

import { accessSync, constants, mkdirSync } from "fs";

/**
 * Error thrown when the state directory cannot be used.
 */
export class DataDirError extends Error {
  constructor(dir: string, cause: unknown) {
    super(
      `Data directory ${dir} is not writable: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = "DataDirError";
  }
}

/**
 * Create the directory if missing and check the process can write to it
 *
 * @throws {DataDirError} If the directory cannot be created or written
 */
export function ensureWritableDir(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
    accessSync(dir, constants.W_OK);
  } catch (err) {
    throw new DataDirError(dir, err);
  }
}
