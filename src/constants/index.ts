export * from "./logger";
export * from "./catalog";
export * from "./server";
export * from "./session";
export * from "./healthcheck";
export * from "./state";
export * from "./clients/http";
