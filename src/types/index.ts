export * from "./logger";
export * from "./catalog";
export * from "./state";
export * from "./menu";
export * from "./config";
export * from "./health";
export * from "./server";
export * from "./clients/http";
