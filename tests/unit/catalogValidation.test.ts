/**
 * Unit tests for catalog validation
 *
 * No DB, no filesystem
 */

import { describe, it, expect } from "vitest";
import {
  validateCatalogRaw,
  CatalogValidationError,
} from "@/utils/catalogValidation";

describe("validateCatalogRaw", () => {
  it("normalizes a valid catalog and drops unknown keys", () => {
    const catalog = validateCatalogRaw({
      cocktails: [
        {
          name: "  Negroni ",
          glass: "Rocks",
          instructions: ["Stir", "Strain"],
          rating: 5,
          ingredients: [
            { name: "Gin", qty: 30, unit: "ml" },
            { name: "Campari", qty: "30" },
            { name: "Orange peel", qty: null },
          ],
        },
      ],
    });

    expect(catalog).toEqual({
      cocktails: [
        {
          name: "Negroni",
          glass: "Rocks",
          instructions: ["Stir", "Strain"],
          ingredients: [
            { name: "Gin", qty: 30, unit: "ml" },
            { name: "Campari", qty: "30" },
            { name: "Orange peel" },
          ],
        },
      ],
    });
  });

  it("treats a missing cocktails key as an empty catalog", () => {
    expect(validateCatalogRaw({})).toEqual({ cocktails: [] });
  });

  it("treats missing ingredients as an empty list", () => {
    const catalog = validateCatalogRaw({ cocktails: [{ name: "Water" }] });
    expect(catalog.cocktails[0].ingredients).toEqual([]);
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => validateCatalogRaw(null)).toThrow(CatalogValidationError);
    expect(() => validateCatalogRaw(["a"])).toThrow(
      "Catalog validation failed: Catalog must be a mapping",
    );
  });

  it("rejects cocktails that is not a list", () => {
    expect(() => validateCatalogRaw({ cocktails: "Mojito" })).toThrow(
      "Catalog validation failed: cocktails must be a list, got string",
    );
  });

  it("reports the path of an empty cocktail name", () => {
    expect(() =>
      validateCatalogRaw({ cocktails: [{ name: "Ok" }, { name: "   " }] }),
    ).toThrow(
      "Catalog validation failed: cocktails[1].name cannot be empty or whitespace-only",
    );
  });

  it("reports the path of an invalid ingredient", () => {
    expect(() =>
      validateCatalogRaw({
        cocktails: [{ name: "Mojito", ingredients: [{ name: "Rum" }, { qty: 2 }] }],
      }),
    ).toThrow(
      "Catalog validation failed: cocktails[0].ingredients[1].name must be a string, got undefined",
    );
  });

  it("rejects a non-scalar quantity", () => {
    expect(() =>
      validateCatalogRaw({
        cocktails: [{ name: "Mojito", ingredients: [{ name: "Rum", qty: [1] }] }],
      }),
    ).toThrow(
      "Catalog validation failed: cocktails[0].ingredients[0].qty must be a string or number, got object",
    );
  });

  it("rejects duplicate cocktail names", () => {
    expect(() =>
      validateCatalogRaw({ cocktails: [{ name: "Mojito" }, { name: "Mojito " }] }),
    ).toThrow('Catalog validation failed: Duplicate cocktail name: "Mojito"');
  });
});
