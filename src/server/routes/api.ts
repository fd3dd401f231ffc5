/**
 * JSON API: public cocktail state and admin toggles
 */

import { json, Router } from "express";
import { z } from "zod";
import type { CatalogRuntime } from "@/types";
import { JSON_BODY_LIMIT } from "@/constants";
import { getCocktailStates, toggleCocktail, toggleIngredient } from "@/menu";
import { ApiError } from "../apiError";
import { requireAuth } from "../middleware/requireAuth";

const NameBody = z.object({
  name: z.string().trim().min(1),
});

/**
 * Name from a toggle request body
 *
 * @throws {ApiError} 400 with the given message when missing or empty
 */
function parseName(body: unknown, missingMessage: string): string {
  const parsed = NameBody.safeParse(body);
  if (!parsed.success) {
    throw new ApiError(400, missingMessage);
  }
  return parsed.data.name;
}

export function apiRouter(catalog: CatalogRuntime, secretKey: string): Router {
  const router = Router();
  const authenticated = requireAuth(secretKey);
  // Body parsing runs after the auth check
  const jsonBody = json({ limit: JSON_BODY_LIMIT });

  router.get("/state", (_req, res) => {
    res.json(getCocktailStates(catalog));
  });

  router.post("/toggle-ingredient", authenticated, jsonBody, (req, res) => {
    const name = parseName(req.body, "Ingredient name is required");
    const result = toggleIngredient(catalog, name);
    res.json({ success: true, available: result.available });
  });

  router.post("/toggle-cocktail", authenticated, jsonBody, (req, res) => {
    const name = parseName(req.body, "Cocktail name is required");
    const result = toggleCocktail(catalog, name);
    if (!result.ok) {
      throw new ApiError(404, "Cocktail not found");
    }
    res.json({ success: true, enabled: result.enabled, is_override: true });
  });

  return router;
}
