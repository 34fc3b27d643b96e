// =============================================================================
// GATEKEEP — Decision Engine
//
// Pure allow/deny checks. No I/O, no suspension, no shared state beyond a
// single registry snapshot per call.
// =============================================================================

import { RoleRegistry } from './registry';
import { AuthRequirement, Principal } from '../types/auth';
import { Permission, RoleName } from '../types/roles';

/**
 * Role membership only. The registry is not consulted: holding a role is not
 * the same as holding its permissions, and an undefined role still counts.
 */
export function hasRole(principal: Principal, role: RoleName): boolean {
  return principal.roles.includes(role);
}

/**
 * Direct permissions first, then each role in the principal's own order.
 * Stops at the first match.
 */
export function hasPermission(
  principal: Principal,
  permission: Permission,
  registry: RoleRegistry
): boolean {
  if (principal.directPermissions.has(permission)) return true;

  const table = registry.snapshot();
  for (const role of principal.roles) {
    if (table.get(role)?.has(permission)) return true;
  }
  return false;
}

/** Union of direct permissions and the permissions of every held role */
export function effectivePermissions(
  principal: Principal,
  registry: RoleRegistry
): Set<Permission> {
  const table = registry.snapshot();
  const permissions = new Set(principal.directPermissions);
  for (const role of principal.roles) {
    for (const permission of table.get(role) ?? []) {
      permissions.add(permission);
    }
  }
  return permissions;
}

export function check(
  principal: Principal,
  requirement: AuthRequirement,
  registry: RoleRegistry
): boolean {
  switch (requirement.kind) {
    case 'role':
      return hasRole(principal, requirement.role);
    case 'permission':
      return hasPermission(principal, requirement.permission, registry);
  }
}

export function requiresRole(role: RoleName): AuthRequirement {
  return { kind: 'role', role };
}

export function requiresPermission(permission: Permission): AuthRequirement {
  return { kind: 'permission', permission };
}

export function describeRequirement(requirement: AuthRequirement): string {
  return requirement.kind === 'role'
    ? `role:${requirement.role}`
    : `permission:${requirement.permission}`;
}
