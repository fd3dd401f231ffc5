/**
 * Ingredient state repository
 *
 * Persists which ingredients are out of stock. An ingredient without a row
 * is available, so a fresh database means every cocktail is on the menu.
 */

import type { IngredientsState, IngredientStateRow } from "@/types";
import { getDb } from "@/db/connection";
import { createNameRecord } from "@/utils/records";

/**
 * Load the availability of every ingredient that has a row
 */
export function getIngredientsState(): IngredientsState {
  const rows = getDb()
    .prepare("SELECT name, available FROM ingredient_state")
    .all() as Pick<IngredientStateRow, "name" | "available">[];

  const state: IngredientsState = createNameRecord();
  for (const row of rows) {
    state[row.name] = row.available === 1;
  }
  return state;
}

/**
 * Availability of one ingredient (true when no row exists)
 */
export function isIngredientAvailableInDb(name: string): boolean {
  const row = getDb()
    .prepare("SELECT available FROM ingredient_state WHERE name = ?")
    .get(name) as Pick<IngredientStateRow, "available"> | undefined;

  return row ? row.available === 1 : true;
}

/**
 * Upsert the availability of an ingredient
 */
export function setIngredientAvailable(name: string, available: boolean): void {
  getDb()
    .prepare(
      `
      INSERT INTO ingredient_state (name, available, updated_at)
      VALUES (?, ?, datetime('now'))
      ON CONFLICT(name) DO UPDATE SET
        available = excluded.available,
        updated_at = excluded.updated_at
    `,
    )
    .run(name, available ? 1 : 0);
}
