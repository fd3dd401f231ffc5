/**
 * Admin authentication middleware
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { SessionPayload } from "@/types";
import { SESSION_COOKIE_NAME } from "@/constants";
import { readCookie, verifySessionToken } from "@/auth";

/**
 * Verified session of the request, or null
 */
export function getSession(req: Request, secretKey: string): SessionPayload | null {
  const token = readCookie(req.headers.cookie, SESSION_COOKIE_NAME);
  return token ? verifySessionToken(token, secretKey) : null;
}

/**
 * Guard for admin routes.
 *
 * API calls (JSON bodies or /api/ paths) get 401 JSON, pages are
 * redirected to the login form.
 */
export function requireAuth(secretKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (getSession(req, secretKey)) {
      next();
      return;
    }

    if (req.is("application/json") || req.originalUrl.startsWith("/api/")) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }
    res.redirect(302, "/login");
  };
}
