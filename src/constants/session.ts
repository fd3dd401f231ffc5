/**
 * Admin session constants
 */

export const SESSION_COOKIE_NAME = "cocktail_session";

/**
 * Default session lifetime (12 hours)
 */
export const DEFAULT_SESSION_TTL_SECONDS = 12 * 60 * 60;

/**
 * Fallbacks used when the environment does not provide secrets.
 * Startup logs a warning when either is in effect.
 */
export const DEFAULT_SECRET_KEY = "dev-secret-key-change-in-production";
export const DEFAULT_ADMIN_PASSWORD = "admin";
