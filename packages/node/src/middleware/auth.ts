/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key is looked up in the configured key registry;
 * the key's bound address becomes the caller.
 * Unsecured mode (development, tests): X-Caller names the caller
 * directly and is granted every permission. The wrapper still enforces
 * its own owner check on administrative operations.
 *
 * On success, sets `c.set("auth", authContext)`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { type: "api-key", address: record.address, role: record.role });
    return next();
  };
}

export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER) ?? "";
    c.set("auth", { type: "caller-header", address: caller.trim(), role: "admin" });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run after an auth middleware. Returns 403 if the caller's role
 * lacks `permission`.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
        403,
      );
    }
    return next();
  };
}
