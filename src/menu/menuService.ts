/**
 * Menu service
 *
 * Combines the immutable catalog with the persisted ingredient/override
 * state. All read-modify-write operations run in one IMMEDIATE transaction
 * so concurrent workers serialize on the database file.
 */

import type {
  AdminView,
  AlcoholGroup,
  CatalogRuntime,
  ToggleCocktailResult,
  ToggleIngredientResult,
} from "@/types";
import { getDb } from "@/db/connection";
import {
  getIngredientsState,
  isIngredientAvailableInDb,
  setIngredientAvailable,
} from "@/db/repos/ingredientStateRepo";
import {
  deleteCocktailOverride,
  getCocktailOverrides,
  setCocktailOverride,
} from "@/db/repos/cocktailOverridesRepo";
import * as logger from "@/logger";
import { createNameRecord } from "@/utils/records";
import {
  allIngredientsAvailable,
  buildMenuCocktails,
  computeCocktailEnabled,
  groupCocktailsByAlcohol,
} from "./availability";

/**
 * Cocktails with computed availability, grouped for the menu page
 */
export function getMenuGroups(catalog: CatalogRuntime): AlcoholGroup[] {
  const cocktails = buildMenuCocktails(
    catalog.cocktails,
    getIngredientsState(),
    getCocktailOverrides(),
  );
  return groupCocktailsByAlcohol(cocktails);
}

/**
 * Enabled flag of every cocktail, in catalog order
 */
export function getCocktailStates(catalog: CatalogRuntime): Record<string, boolean> {
  const ingredientsState = getIngredientsState();
  const overrides = getCocktailOverrides();

  const states = createNameRecord<boolean>();
  for (const cocktail of catalog.cocktails) {
    states[cocktail.name] = computeCocktailEnabled(cocktail, ingredientsState, overrides);
  }
  return states;
}

/**
 * Data for the admin page
 */
export function getAdminView(catalog: CatalogRuntime): AdminView {
  const ingredientsState = getIngredientsState();
  const cocktails = buildMenuCocktails(
    catalog.cocktails,
    ingredientsState,
    getCocktailOverrides(),
  );
  return {
    groups: groupCocktailsByAlcohol(cocktails),
    ingredients: catalog.ingredients,
    ingredientsState,
  };
}

/**
 * Flip the availability of an ingredient.
 *
 * When the ingredient comes back in stock, overrides on cocktails that use
 * it are dropped if all of their ingredients are now available, so those
 * cocktails follow availability again.
 */
export function toggleIngredient(
  catalog: CatalogRuntime,
  name: string,
): ToggleIngredientResult {
  const db = getDb();

  const toggle = db.transaction((): ToggleIngredientResult => {
    const available = !isIngredientAvailableInDb(name);
    setIngredientAvailable(name, available);

    const clearedOverrides: string[] = [];
    if (available) {
      const ingredientsState = getIngredientsState();
      const overrides = getCocktailOverrides();

      for (const cocktail of catalog.cocktails) {
        const usesIngredient = cocktail.ingredients.some((i) => i.name === name);
        if (
          usesIngredient &&
          Object.prototype.hasOwnProperty.call(overrides, cocktail.name) &&
          allIngredientsAvailable(cocktail, ingredientsState)
        ) {
          deleteCocktailOverride(cocktail.name);
          clearedOverrides.push(cocktail.name);
        }
      }
    }

    return { available, clearedOverrides };
  });

  const result = toggle.immediate();
  logger.info("Ingredient toggled", {
    ingredient: name,
    available: result.available,
    clearedOverrides: result.clearedOverrides,
  });
  return result;
}

/**
 * Set a manual override opposite to the cocktail's current enabled state
 */
export function toggleCocktail(
  catalog: CatalogRuntime,
  name: string,
): ToggleCocktailResult {
  const cocktail = catalog.byName.get(name);
  if (!cocktail) {
    return { ok: false, reason: "NOT_FOUND" };
  }

  const db = getDb();
  const toggle = db.transaction((): boolean => {
    const current = computeCocktailEnabled(
      cocktail,
      getIngredientsState(),
      getCocktailOverrides(),
    );
    setCocktailOverride(name, !current);
    return !current;
  });

  const enabled = toggle.immediate();
  logger.info("Cocktail override set", { cocktail: name, enabled });
  return { ok: true, enabled };
}
