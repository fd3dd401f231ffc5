/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/ingredientStateRepo";
export * from "./repos/cocktailOverridesRepo";
