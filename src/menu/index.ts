export * from "./mainAlcohol";
export * from "./availability";
export * from "./menuService";
