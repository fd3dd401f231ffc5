/**
 * Catalog validation module
 *
 * Validates the deserialized cocktails.yaml document and enforces invariants:
 * - Every cocktail has a non-empty name
 * - No duplicate cocktail names (names key the persisted overrides)
 * - Ingredients carry a non-empty name and a scalar quantity
 * - Optional text fields are strings
 *
 * Validation is fail-fast: throws on first error with the offending field path.
 */

import type { CatalogRaw, CocktailRaw, IngredientRaw } from "@/types/catalog";

/**
 * Error thrown when catalog validation fails.
 */
export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(`Catalog validation failed: ${message}`);
    this.name = "CatalogValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param fieldPath - Field path for error messages (e.g., "cocktails[0].name")
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new CatalogValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new CatalogValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

/**
 * Reads an optional string field (null and undefined mean absent).
 */
function optionalString(value: unknown, fieldPath: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new CatalogValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  return value;
}

/**
 * Reads an optional list field (null and undefined mean empty).
 */
function optionalArray(value: unknown, fieldPath: string): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new CatalogValidationError(
      `${fieldPath} must be a list, got ${typeof value}`,
    );
  }
  return value;
}

function validateIngredient(value: unknown, fieldPath: string): IngredientRaw {
  if (!isRecord(value)) {
    throw new CatalogValidationError(`${fieldPath} must be a mapping`);
  }

  validateNonEmptyString(value.name, `${fieldPath}.name`);
  const ingredient: IngredientRaw = { name: value.name.trim() };

  const qty = value.qty;
  if (typeof qty === "string" || typeof qty === "number") {
    ingredient.qty = qty;
  } else if (qty !== undefined && qty !== null) {
    throw new CatalogValidationError(
      `${fieldPath}.qty must be a string or number, got ${typeof qty}`,
    );
  }

  const unit = optionalString(value.unit, `${fieldPath}.unit`);
  if (unit !== undefined) {
    ingredient.unit = unit;
  }

  return ingredient;
}

function validateInstructions(
  value: unknown,
  fieldPath: string,
): string | string[] | undefined {
  if (Array.isArray(value)) {
    return value.map((step: unknown, index: number) => {
      validateNonEmptyString(step, `${fieldPath}[${index}]`);
      return step;
    });
  }
  return optionalString(value, fieldPath);
}

function validateCocktail(value: unknown, index: number): CocktailRaw {
  const prefix = `cocktails[${index}]`;
  if (!isRecord(value)) {
    throw new CatalogValidationError(`${prefix} must be a mapping`);
  }

  validateNonEmptyString(value.name, `${prefix}.name`);

  const ingredients = optionalArray(value.ingredients, `${prefix}.ingredients`).map(
    (ingredient, ingredientIndex) =>
      validateIngredient(ingredient, `${prefix}.ingredients[${ingredientIndex}]`),
  );

  const cocktail: CocktailRaw = { name: value.name.trim(), ingredients };

  const description = optionalString(value.description, `${prefix}.description`);
  if (description !== undefined) cocktail.description = description;

  const instructions = validateInstructions(value.instructions, `${prefix}.instructions`);
  if (instructions !== undefined) cocktail.instructions = instructions;

  const glass = optionalString(value.glass, `${prefix}.glass`);
  if (glass !== undefined) cocktail.glass = glass;

  const garnish = optionalString(value.garnish, `${prefix}.garnish`);
  if (garnish !== undefined) cocktail.garnish = garnish;

  const image = optionalString(value.image, `${prefix}.image`);
  if (image !== undefined) cocktail.image = image;

  return cocktail;
}

/**
 * Checks for duplicate cocktail names.
 */
function checkDuplicateNames(cocktails: CocktailRaw[]): void {
  const seen = new Set<string>();
  for (const cocktail of cocktails) {
    if (seen.has(cocktail.name)) {
      throw new CatalogValidationError(
        `Duplicate cocktail name: "${cocktail.name}"`,
      );
    }
    seen.add(cocktail.name);
  }
}

/**
 * Validates raw catalog data from YAML.
 *
 * A document without a `cocktails` key is an empty catalog; an empty
 * file (null document) is rejected.
 *
 * @param raw - Deserialized YAML document
 * @returns A normalized copy of the catalog (names trimmed, unknown keys dropped)
 * @throws {CatalogValidationError} On the first invalid field
 *
 * @example
 * const catalog = validateCatalogRaw(YAML.parse(text));
 */
export function validateCatalogRaw(raw: unknown): CatalogRaw {
  if (!isRecord(raw)) {
    throw new CatalogValidationError("Catalog must be a mapping");
  }

  const cocktails = optionalArray(raw.cocktails, "cocktails").map(validateCocktail);
  checkDuplicateNames(cocktails);

  return { cocktails };
}
