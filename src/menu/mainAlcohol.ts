/**
 * Main alcohol detection
 *
 * Picks the base spirit a cocktail is listed under on the menu.
 */

import type { CocktailRaw } from "@/types";
import { ALCOHOL_KEYWORDS, OTHER_ALCOHOL_GROUP } from "@/constants";
import { parseLeadingInteger } from "@/utils/quantity";

/**
 * True when the ingredient name contains one of the spirit keywords.
 * Substring match on the lower-cased name ("Aged rum", "Rye whiskey").
 */
export function isAlcoholicIngredient(name: string): boolean {
  const lower = name.toLowerCase();
  return ALCOHOL_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Identify the main alcohol for a cocktail.
 *
 * The alcoholic ingredient with the largest leading-integer quantity wins;
 * ties go to the earliest ingredient in the recipe.
 *
 * @returns The ingredient name, or "Other" when the recipe has no spirit
 */
export function getMainAlcohol(cocktail: Pick<CocktailRaw, "ingredients">): string {
  let best: { name: string; qty: number } | null = null;

  for (const ingredient of cocktail.ingredients) {
    if (!isAlcoholicIngredient(ingredient.name)) {
      continue;
    }
    const qty = parseLeadingInteger(ingredient.qty);
    if (best === null || qty > best.qty) {
      best = { name: ingredient.name, qty };
    }
  }

  return best ? best.name : OTHER_ALCOHOL_GROUP;
}
