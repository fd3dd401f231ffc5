/**
 * Catalog configuration constants
 */

/**
 * Default path of the cocktail dataset, relative to the working directory.
 */
export const DEFAULT_CATALOG_PATH = "cocktails.yaml";

/**
 * Substrings that mark an ingredient as a base spirit.
 * Matched against the lower-cased ingredient name.
 */
export const ALCOHOL_KEYWORDS: readonly string[] = [
  "rum",
  "gin",
  "vodka",
  "whiskey",
  "whisky",
  "tequila",
  "brandy",
  "cognac",
  "bourbon",
  "scotch",
  "rye",
  "mezcal",
  "pisco",
  "cachaça",
];

/**
 * Group label for cocktails without a recognised spirit
 */
export const OTHER_ALCOHOL_GROUP = "Other";
