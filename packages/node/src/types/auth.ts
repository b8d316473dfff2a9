/**
 * Authentication and authorization types.
 *
 * API keys arrive in the X-Api-Key header. Each key carries a role
 * and the account it acts for.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Address } from "@lapse/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/**
 * - read: balances, buckets, allowances, events
 * - write: transfer, approve, transfer-from as the bound account
 * - admin: mint and burn for any account
 */
export type Permission = "read" | "write" | "admin";

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

export function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 *
 * In unsecured mode every caller is an anonymous admin whose account
 * comes from the X-Account header, when present.
 */
export interface AuthContext {
  readonly type: "api-key" | "anonymous";
  readonly identity: string;
  readonly role: Role;
  readonly account: Address | undefined;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly account: Address;
}
