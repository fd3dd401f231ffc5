/**
 * Menu state type definitions
 *
 * Mutable state persisted in the data directory (SQLite).
 */

/**
 * Ingredient availability row (database entity)
 */
export type IngredientStateRow = {
  name: string;
  /** 1 = available, 0 = out of stock (SQLite has no boolean) */
  available: 0 | 1;
  /** Last update timestamp (ISO 8601 string) */
  updated_at: string;
};

/**
 * Cocktail override row (database entity)
 */
export type CocktailOverrideRow = {
  name: string;
  /** 1 = forced on, 0 = forced off */
  enabled: 0 | 1;
  updated_at: string;
};

/**
 * Ingredient availability by name. Missing names are available.
 */
export type IngredientsState = Record<string, boolean>;

/**
 * Manual overrides by cocktail name (true = force enable, false = force disable)
 */
export type CocktailOverrides = Record<string, boolean>;
