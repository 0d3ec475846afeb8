/**
 * Authentication and authorization types.
 *
 * Callers are identified by API key (X-Api-Key) in secured mode, or by
 * the X-Caller header in unsecured development mode. Each API key is
 * bound to one address; that address is the caller the wrapper sees.
 *
 * Role hierarchy: admin > user
 */

import type { Address } from "@basketwrap/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "user";

export type Permission = "read" | "write" | "admin";

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  user: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "caller-header";
  readonly address: Address;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: Address;
}
