/**
 * Menu view model types
 */

import type { CocktailRaw } from "./catalog";

/**
 * Cocktail with its computed availability
 */
export type MenuCocktail = Readonly<CocktailRaw> & {
  enabled: boolean;
  /** True when the enabled flag comes from a manual override */
  isOverride: boolean;
};

/**
 * Cocktails sharing the same main alcohol
 */
export type AlcoholGroup = {
  alcohol: string;
  cocktails: MenuCocktail[];
};

/**
 * Everything the admin page renders
 */
export type AdminView = {
  groups: AlcoholGroup[];
  ingredients: ReadonlyArray<string>;
  ingredientsState: Record<string, boolean>;
};

/**
 * Result of POST /api/toggle-ingredient
 */
export type ToggleIngredientResult = {
  available: boolean;
  /** Cocktails whose override was cleared by this toggle */
  clearedOverrides: string[];
};

/**
 * Result of POST /api/toggle-cocktail
 */
export type ToggleCocktailResult =
  | { ok: true; enabled: boolean }
  | { ok: false; reason: "NOT_FOUND" };
