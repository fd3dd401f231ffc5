/**
 * Catalog loading and compilation
 *
 * Loads cocktails.yaml, validates it, and compiles it into the immutable
 * structure a worker serves for its whole lifetime.
 */

import * as fs from "fs";
import * as path from "path";
import YAML from "yaml";
import type { CatalogRaw, CatalogRuntime, CocktailRaw } from "@/types/catalog";
import { validateCatalogRaw } from "@/utils/catalogValidation";

/**
 * Error thrown when the catalog file cannot be read or parsed.
 */
export class CatalogLoadError extends Error {
  constructor(message: string) {
    super(`Catalog load failed: ${message}`);
    this.name = "CatalogLoadError";
  }
}

/**
 * Freezes a validated cocktail in place, including its nested lists.
 */
function freezeCocktail(cocktail: CocktailRaw): Readonly<CocktailRaw> {
  for (const ingredient of cocktail.ingredients) {
    Object.freeze(ingredient);
  }
  Object.freeze(cocktail.ingredients);
  if (Array.isArray(cocktail.instructions)) {
    Object.freeze(cocktail.instructions);
  }
  return Object.freeze(cocktail);
}

/**
 * Compiles a validated raw catalog into runtime form.
 *
 * Compilation steps:
 * 1. Freeze each cocktail
 * 2. Index cocktails by name
 * 3. Collect the sorted set of ingredient names
 */
export function compileCatalog(raw: CatalogRaw, sourcePath: string): CatalogRuntime {
  const cocktails = raw.cocktails.map(freezeCocktail);

  const byName = new Map<string, Readonly<CocktailRaw>>();
  const ingredientNames = new Set<string>();
  for (const cocktail of cocktails) {
    byName.set(cocktail.name, cocktail);
    for (const ingredient of cocktail.ingredients) {
      ingredientNames.add(ingredient.name);
    }
  }

  return Object.freeze({
    cocktails: Object.freeze(cocktails),
    byName,
    ingredients: Object.freeze([...ingredientNames].sort()),
    sourcePath,
  });
}

/**
 * Reads and parses the YAML document without validating it.
 *
 * Used by the health check to confirm the file is still readable.
 *
 * @throws {CatalogLoadError} If the file is missing, unreadable or not valid YAML
 */
export function readCatalogDocument(catalogPath: string): unknown {
  if (!fs.existsSync(catalogPath)) {
    throw new CatalogLoadError(`${path.basename(catalogPath)} not found`);
  }

  let text: string;
  try {
    text = fs.readFileSync(catalogPath, "utf-8");
  } catch (err) {
    throw new CatalogLoadError(
      `cannot read ${catalogPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  try {
    return YAML.parse(text);
  } catch (err) {
    throw new CatalogLoadError(
      `invalid YAML in ${catalogPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Loads and compiles the catalog.
 *
 * This is the main entry point for catalog loading, called once per worker.
 * The function is fail-fast: any read, parse or validation error will throw.
 *
 * @param catalogPath - Absolute path of cocktails.yaml
 * @throws {CatalogLoadError} If the file cannot be read or parsed
 * @throws {CatalogValidationError} If validation fails
 *
 * @example
 * const catalog = loadCatalog(config.catalogPath);
 * logger.info("Catalog loaded", { cocktails: catalog.cocktails.length });
 */
export function loadCatalog(catalogPath: string): CatalogRuntime {
  const document = readCatalogDocument(catalogPath);
  const validated = validateCatalogRaw(document);
  return compileCatalog(validated, catalogPath);
}
