/**
 * Cocktail overrides repository
 *
 * Manual enable/disable decisions that win over ingredient availability.
 */

import type { CocktailOverrideRow, CocktailOverrides } from "@/types";
import { getDb } from "@/db/connection";
import { createNameRecord } from "@/utils/records";

/**
 * Load all overrides keyed by cocktail name
 */
export function getCocktailOverrides(): CocktailOverrides {
  const rows = getDb()
    .prepare("SELECT name, enabled FROM cocktail_override")
    .all() as Pick<CocktailOverrideRow, "name" | "enabled">[];

  const overrides: CocktailOverrides = createNameRecord();
  for (const row of rows) {
    overrides[row.name] = row.enabled === 1;
  }
  return overrides;
}

/**
 * Force a cocktail on or off
 */
export function setCocktailOverride(name: string, enabled: boolean): void {
  getDb()
    .prepare(
      `
      INSERT INTO cocktail_override (name, enabled, updated_at)
      VALUES (?, ?, datetime('now'))
      ON CONFLICT(name) DO UPDATE SET
        enabled = excluded.enabled,
        updated_at = excluded.updated_at
    `,
    )
    .run(name, enabled ? 1 : 0);
}

/**
 * Remove the override of a cocktail
 *
 * @returns true if a row was deleted
 */
export function deleteCocktailOverride(name: string): boolean {
  const result = getDb()
    .prepare("DELETE FROM cocktail_override WHERE name = ?")
    .run(name);
  return result.changes > 0;
}
