/**
 * Catalog type definitions
 *
 * The catalog is the read-only cocktail dataset bundled with the service
 * (cocktails.yaml). It is loaded once per worker process at startup.
 *
 * Two forms exist:
 * - CatalogRaw: YAML shape (deserialized from file)
 * - CatalogRuntime: Compiled, immutable form used by request handlers
 */

/**
 * Ingredient line of a cocktail recipe.
 */
export type IngredientRaw = {
  /** Ingredient name, also the key for availability state (e.g., "White rum") */
  name: string;
  /** Quantity as written in the dataset (e.g., 45, "15 leaves") */
  qty?: string | number;
  /** Unit for numeric quantities (e.g., "ml") */
  unit?: string;
};

/**
 * Cocktail definition from catalog YAML.
 */
export type CocktailRaw = {
  /** Unique cocktail name, also the key for overrides */
  name: string;
  ingredients: IngredientRaw[];
  description?: string;
  /** Preparation steps, either one paragraph or a list of steps */
  instructions?: string | string[];
  glass?: string;
  garnish?: string;
  image?: string;
};

/**
 * Raw catalog structure as deserialized from YAML.
 */
export type CatalogRaw = {
  cocktails: CocktailRaw[];
};

/**
 * Compiled catalog held by a worker.
 *
 * Every collection is frozen: the catalog never changes while the
 * worker is running.
 */
export type CatalogRuntime = {
  /** Cocktails in file order */
  cocktails: ReadonlyArray<Readonly<CocktailRaw>>;
  /** Cocktails indexed by name */
  byName: ReadonlyMap<string, Readonly<CocktailRaw>>;
  /** Unique ingredient names across all cocktails, sorted */
  ingredients: ReadonlyArray<string>;
  /** Absolute path the catalog was loaded from */
  sourcePath: string;
};
