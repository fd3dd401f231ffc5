/**
 * Unit tests for the state directory check
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { DataDirError, ensureWritableDir } from "@/utils/dataDir";

describe("ensureWritableDir", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "cocktail-menu-datadir-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("creates missing directories", () => {
    const dir = join(root, "nested", "data");

    ensureWritableDir(dir);

    expect(existsSync(dir)).toBe(true);
  });

  it("fails when the path is not a directory", () => {
    const file = join(root, "state.db");
    writeFileSync(file, "");

    expect(() => ensureWritableDir(join(file, "data"))).toThrow(DataDirError);
  });
});
