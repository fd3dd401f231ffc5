/**
 * Integration tests for the persisted menu state
 *
 * Runs the repositories and menu service against a real temp SQLite file.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { createTestCatalog } from "../../helpers/fixtures";
import {
  deleteCocktailOverride,
  getCocktailOverrides,
  getIngredientsState,
  isIngredientAvailableInDb,
  migrateDb,
  setCocktailOverride,
  setIngredientAvailable,
} from "@/db";
import {
  getAdminView,
  getCocktailStates,
  getMenuGroups,
  toggleCocktail,
  toggleIngredient,
} from "@/menu";
import * as logger from "@/logger";

describe("menu state persistence", () => {
  let harness: TestDbHarness;
  const catalog = createTestCatalog();

  beforeEach(() => {
    logger.setLevel("error");
    harness = createTestDb();
  });

  afterEach(() => {
    harness.cleanup();
  });

  describe("migrations", () => {
    it("records applied migrations and skips them on rerun", () => {
      const versions = harness.db
        .prepare("SELECT version FROM schema_migrations ORDER BY version")
        .all();
      expect(versions).toEqual([{ version: "001_menu_state.sql" }]);

      expect(migrateDb(harness.db)).toEqual([]);
    });
  });

  describe("repositories", () => {
    it("treats ingredients without a row as available", () => {
      expect(getIngredientsState()).toEqual({});
      expect(isIngredientAvailableInDb("Gin")).toBe(true);
    });

    it("upserts ingredient availability", () => {
      setIngredientAvailable("Gin", false);
      setIngredientAvailable("Gin", true);
      setIngredientAvailable("Mint", false);

      expect(getIngredientsState()).toEqual({ Gin: true, Mint: false });
      expect(isIngredientAvailableInDb("Mint")).toBe(false);
    });

    it("sets and deletes cocktail overrides", () => {
      setCocktailOverride("Mojito", false);
      setCocktailOverride("Mojito", true);
      expect(getCocktailOverrides()).toEqual({ Mojito: true });

      expect(deleteCocktailOverride("Mojito")).toBe(true);
      expect(deleteCocktailOverride("Mojito")).toBe(false);
      expect(getCocktailOverrides()).toEqual({});
    });
  });

  describe("toggleIngredient", () => {
    it("marks an ingredient without a row unavailable first", () => {
      const result = toggleIngredient(catalog, "Mint");

      expect(result).toEqual({ available: false, clearedOverrides: [] });
      expect(getCocktailStates(catalog)).toEqual({
        Mojito: false,
        Daiquiri: true,
        "Gin Tonic": true,
        "Virgin Fizz": true,
      });
    });

    it("flips back to available on the second toggle", () => {
      toggleIngredient(catalog, "Mint");
      expect(toggleIngredient(catalog, "Mint").available).toBe(true);
      expect(getIngredientsState()).toEqual({ Mint: true });
    });

    it("clears overrides of cocktails that are fully available again", () => {
      toggleIngredient(catalog, "Lime juice");
      setCocktailOverride("Mojito", true);
      setCocktailOverride("Daiquiri", false);
      setCocktailOverride("Gin Tonic", false);

      const result = toggleIngredient(catalog, "Lime juice");

      expect(result.available).toBe(true);
      expect(result.clearedOverrides).toEqual(["Mojito", "Daiquiri"]);
      expect(getCocktailOverrides()).toEqual({ "Gin Tonic": false });
    });

    it("keeps overrides while another ingredient is still missing", () => {
      toggleIngredient(catalog, "Mint");
      toggleIngredient(catalog, "Lime juice");
      setCocktailOverride("Mojito", true);

      const result = toggleIngredient(catalog, "Lime juice");

      expect(result.clearedOverrides).toEqual([]);
      expect(getCocktailOverrides()).toEqual({ Mojito: true });
    });
  });

  describe("toggleCocktail", () => {
    it("reports unknown cocktails", () => {
      expect(toggleCocktail(catalog, "Zombie")).toEqual({ ok: false, reason: "NOT_FOUND" });
      expect(getCocktailOverrides()).toEqual({});
    });

    it("overrides to the opposite of the computed state", () => {
      expect(toggleCocktail(catalog, "Gin Tonic")).toEqual({ ok: true, enabled: false });
      expect(toggleCocktail(catalog, "Gin Tonic")).toEqual({ ok: true, enabled: true });
      expect(getCocktailOverrides()).toEqual({ "Gin Tonic": true });
    });

    it("can force an unavailable cocktail on", () => {
      toggleIngredient(catalog, "Gin");

      expect(toggleCocktail(catalog, "Gin Tonic")).toEqual({ ok: true, enabled: true });
      expect(getCocktailStates(catalog)["Gin Tonic"]).toBe(true);
    });
  });

  describe("names that collide with object properties", () => {
    const reserved = createTestCatalog([
      {
        name: "Proto Sour",
        ingredients: [
          { name: "Pisco", qty: 60, unit: "ml" },
          { name: "__proto__", qty: 1 },
        ],
      },
      { name: "__proto__", ingredients: [{ name: "constructor", qty: 1 }] },
    ]);

    it("stores an ingredient named __proto__", () => {
      expect(toggleIngredient(reserved, "__proto__").available).toBe(false);

      const state = getIngredientsState();
      expect(Object.keys(state)).toEqual(["__proto__"]);
      expect(state["__proto__"]).toBe(false);
      expect(getCocktailStates(reserved)["Proto Sour"]).toBe(false);
    });

    it("reports a cocktail named __proto__", () => {
      const states = getCocktailStates(reserved);

      expect(Object.keys(states)).toEqual(["Proto Sour", "__proto__"]);
      expect(states["__proto__"]).toBe(true);
    });

    it("keeps an override on a cocktail named __proto__", () => {
      expect(toggleCocktail(reserved, "__proto__")).toEqual({ ok: true, enabled: false });

      const overrides = getCocktailOverrides();
      expect(Object.keys(overrides)).toEqual(["__proto__"]);
      expect(getCocktailStates(reserved)["__proto__"]).toBe(false);
    });
  });

  describe("views", () => {
    it("groups the menu by main alcohol", () => {
      toggleIngredient(catalog, "Mint");

      const groups = getMenuGroups(catalog);

      expect(groups.map((g) => g.alcohol)).toEqual(["Gin", "Other", "White rum"]);
      expect(groups[2].cocktails.map((c) => [c.name, c.enabled])).toEqual([
        ["Daiquiri", true],
        ["Mojito", false],
      ]);
    });

    it("exposes ingredients, their state and override markers to the admin view", () => {
      toggleIngredient(catalog, "Soda water");
      toggleCocktail(catalog, "Virgin Fizz");

      const view = getAdminView(catalog);

      expect(view.ingredients).toEqual([
        "Gin",
        "Lime juice",
        "Mint",
        "Soda water",
        "Tonic water",
        "White rum",
      ]);
      expect(view.ingredientsState).toEqual({ "Soda water": false });
      const other = view.groups.find((g) => g.alcohol === "Other");
      expect(other?.cocktails.map((c) => [c.name, c.enabled, c.isOverride])).toEqual([
        ["Virgin Fizz", true, true],
      ]);
    });
  });
});
