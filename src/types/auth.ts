// =============================================================================
// GATEKEEP — Authentication & Authorization Types
// =============================================================================

import { Permission, RoleName } from './roles';

/**
 * The resolved identity of one authenticated caller.
 *
 * A principal is a value: authenticators build a fresh one per call and
 * nothing in the engine holds on to it. Roles are resolved against the
 * registry at decision time, so registry changes are seen immediately.
 */
export interface Principal {
  /** Application-defined user ID */
  readonly id: string;
  readonly displayName: string;
  /** Role names, in assignment order, without duplicates */
  readonly roles: readonly RoleName[];
  /** Permissions granted outside any role */
  readonly directPermissions: ReadonlySet<Permission>;
}

/** Closed set of failure kinds reported by the engine */
export type AuthErrorKind =
  | 'InvalidToken'
  | 'ExpiredToken'
  | 'ProviderUnavailable'
  | 'Unauthorized';

/**
 * What a protected operation requires. Exactly one role or one
 * permission, never a combination.
 */
export type AuthRequirement =
  | { kind: 'role'; role: RoleName }
  | { kind: 'permission'; permission: Permission };

/** JSON shape of a principal, as returned by /api/auth/session */
export interface PrincipalRecord {
  id: string;
  displayName: string;
  roles: RoleName[];
  permissions: Permission[];
}
