/**
 * HTTP client wrapper: GET with a timeout over native fetch
 * Used by the health probe
 */

import type { HttpRequest } from "@/types/clients/http";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * Perform a GET request with a timeout
 *
 * JSON responses are parsed, anything else is returned as text.
 *
 * @returns Parsed body (unknown: callers validate the shape)
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} AbortError on timeout, TypeError on network failure
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  // Setup timeout using AbortController
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(req.url, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: controller.signal,
    });

    if (!response.ok) {
      const bodySnippet = await extractBodySnippet(response);
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url: req.url,
        bodySnippet,
      });
    }

    if (response.status === 204) {
      return undefined;
    }

    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("application/json")) {
      return await response.text();
    }

    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        url: req.url,
        status: response.status,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      return text;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
