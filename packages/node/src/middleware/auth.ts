/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key is looked up in the configured key registry
 * and the caller acts for the key's bound account.
 *
 * Unsecured mode: every caller is an anonymous admin acting for the
 * account named in X-Account, when present.
 *
 * On success, sets `c.set("auth", authContext)`.
 */

import type { MiddlewareHandler } from "hono";
import { getAddress } from "viem";
import { isAccountAddress } from "@lapse/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_HEADER = "X-Account";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    const auth: AuthContext = {
      type: "api-key",
      identity: record.key,
      role: record.role,
      account: record.account,
    };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Full access without credentials. For local use and tests.
 */
export function anonymousAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(ACCOUNT_HEADER);
    if (header !== undefined && !isAccountAddress(header)) {
      return c.json(
        createErrorEnvelope("INVALID_ADDRESS", `Invalid ${ACCOUNT_HEADER} header: "${header}"`),
        400,
      );
    }

    const auth: AuthContext = {
      type: "anonymous",
      identity: "anonymous",
      role: "admin",
      account: header !== undefined ? getAddress(header) : undefined,
    };
    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run AFTER an auth middleware. Returns 403 if the caller's role
 * lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
