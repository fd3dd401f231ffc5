/**
 * Cocktail availability and menu grouping
 *
 * Pure functions: state comes in as plain maps, nothing touches the DB here.
 */

import type {
  AlcoholGroup,
  CocktailOverrides,
  CocktailRaw,
  IngredientsState,
  MenuCocktail,
} from "@/types";
import { getMainAlcohol } from "./mainAlcohol";

/**
 * Ingredient availability with the "missing means available" default
 */
export function isIngredientAvailable(
  ingredientsState: IngredientsState,
  name: string,
): boolean {
  return Object.prototype.hasOwnProperty.call(ingredientsState, name)
    ? ingredientsState[name]
    : true;
}

/**
 * True when every ingredient of the cocktail is in stock
 */
export function allIngredientsAvailable(
  cocktail: Pick<CocktailRaw, "ingredients">,
  ingredientsState: IngredientsState,
): boolean {
  return cocktail.ingredients.every((ingredient) =>
    isIngredientAvailable(ingredientsState, ingredient.name),
  );
}

/**
 * Compute if a cocktail should be enabled.
 *
 * A manual override always wins; otherwise the cocktail is enabled when
 * all of its ingredients are available.
 */
export function computeCocktailEnabled(
  cocktail: Pick<CocktailRaw, "name" | "ingredients">,
  ingredientsState: IngredientsState,
  overrides: CocktailOverrides,
): boolean {
  if (Object.prototype.hasOwnProperty.call(overrides, cocktail.name)) {
    return overrides[cocktail.name];
  }
  return allIngredientsAvailable(cocktail, ingredientsState);
}

/**
 * Attach the computed enabled/override flags to each cocktail
 */
export function buildMenuCocktails(
  cocktails: ReadonlyArray<Readonly<CocktailRaw>>,
  ingredientsState: IngredientsState,
  overrides: CocktailOverrides,
): MenuCocktail[] {
  return cocktails.map((cocktail) => ({
    ...cocktail,
    enabled: computeCocktailEnabled(cocktail, ingredientsState, overrides),
    isOverride: Object.prototype.hasOwnProperty.call(overrides, cocktail.name),
  }));
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Group cocktails by main alcohol and sort them.
 *
 * Groups are ordered by alcohol name. Within a group enabled cocktails come
 * first, then each block is alphabetical (case-insensitive).
 */
export function groupCocktailsByAlcohol(cocktails: MenuCocktail[]): AlcoholGroup[] {
  const grouped = new Map<string, MenuCocktail[]>();
  for (const cocktail of cocktails) {
    const alcohol = getMainAlcohol(cocktail);
    const group = grouped.get(alcohol);
    if (group) {
      group.push(cocktail);
    } else {
      grouped.set(alcohol, [cocktail]);
    }
  }

  const groups: AlcoholGroup[] = [];
  for (const [alcohol, members] of grouped) {
    members.sort((a, b) => {
      if (a.enabled !== b.enabled) {
        return a.enabled ? -1 : 1;
      }
      return compareStrings(a.name.toLowerCase(), b.name.toLowerCase());
    });
    groups.push({ alcohol, cocktails: members });
  }

  return groups.sort((a, b) => compareStrings(a.alcohol, b.alcohol));
}
