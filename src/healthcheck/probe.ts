/**
 * Health probe: one HTTP fetch of the liveness endpoint
 */

import type { HttpRequest, ProbeResult } from "@/types";
import { httpRequest, HttpError } from "@/clients/http";

export type RequestFn = (req: HttpRequest) => Promise<unknown>;

function describeFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof HttpError) {
    return `HTTP ${err.status}`;
  }
  if (err instanceof Error && err.name === "AbortError") {
    return `timed out after ${timeoutMs}ms`;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Fetch the health URL once. Any 2xx within the timeout is a success.
 *
 * @param request - HTTP function (injectable for tests)
 */
export async function probeHealth(
  url: string,
  timeoutMs: number,
  request: RequestFn = httpRequest,
): Promise<ProbeResult> {
  const startedAt = Date.now();
  try {
    await request({ url, timeoutMs });
    return { ok: true, durationMs: Date.now() - startedAt };
  } catch (err) {
    return {
      ok: false,
      durationMs: Date.now() - startedAt,
      error: describeFailure(err, timeoutMs),
    };
  }
}
