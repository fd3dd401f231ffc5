/**
 * Admin session tokens
 *
 * Stateless cookie sessions: `<base64url(payload)>.<base64url(hmac)>` signed
 * with HMAC-SHA256 over the encoded payload using SECRET_KEY. Every worker
 * verifies tokens on its own, nothing is stored server-side.
 */

import { createHash, createHmac, timingSafeEqual } from "crypto";
import type { SessionPayload } from "@/types";

function sign(input: string, secret: string): string {
  return createHmac("sha256", secret).update(input).digest("base64url");
}

function isSessionPayload(value: unknown): value is SessionPayload {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "sub" in value &&
    value.sub === "admin" &&
    "exp" in value &&
    typeof value.exp === "number" &&
    Number.isFinite(value.exp)
  );
}

/**
 * Issue a signed admin session token
 *
 * @param nowMs - Current time (injectable for tests)
 */
export function createSessionToken(
  secret: string,
  ttlSeconds: number,
  nowMs: number = Date.now(),
): string {
  const payload: SessionPayload = {
    sub: "admin",
    exp: Math.floor(nowMs / 1000) + ttlSeconds,
  };
  const encodedPayload = Buffer.from(JSON.stringify(payload)).toString(
    "base64url",
  );
  return `${encodedPayload}.${sign(encodedPayload, secret)}`;
}

/**
 * Verify a session token
 *
 * @returns The payload, or null when the token is malformed, tampered with or expired
 */
export function verifySessionToken(
  token: string,
  secret: string,
  nowMs: number = Date.now(),
): SessionPayload | null {
  const parts = token.split(".");
  if (parts.length !== 2) {
    return null;
  }
  const [encodedPayload, signature] = parts;

  const expected = Buffer.from(sign(encodedPayload, secret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(encodedPayload, "base64url").toString("utf-8"));
  } catch {
    return null;
  }

  if (!isSessionPayload(payload)) {
    return null;
  }
  if (payload.exp <= Math.floor(nowMs / 1000)) {
    return null;
  }
  return payload;
}

/**
 * Constant-time password comparison
 *
 * Both sides are hashed first so inputs of different lengths compare
 * without leaking the expected length.
 */
export function passwordMatches(given: string, expected: string): boolean {
  const a = createHash("sha256").update(given).digest();
  const b = createHash("sha256").update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * Read one cookie from a Cookie request header
 */
export function readCookie(header: string | undefined, name: string): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(";")) {
    const separator = part.indexOf("=");
    if (separator === -1) {
      continue;
    }
    if (part.slice(0, separator).trim() !== name) {
      continue;
    }
    const raw = part.slice(separator + 1).trim();
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
  return undefined;
}
