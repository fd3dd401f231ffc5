/**
 * HTTP client public API
 */

export { httpRequest } from "./httpClient";
export { HttpError } from "./httpError";
export type { HttpRequest, HttpErrorDetails } from "@/types";
