export * from "./probe";
export * from "./monitor";
