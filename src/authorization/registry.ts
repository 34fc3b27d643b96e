// =============================================================================
// GATEKEEP — Role Registry
//
// Process-wide table of role name → permission set.
//
// The table is never edited in place. Every define/load builds a new Map
// and swaps the reference, so a reader holding a snapshot sees either the
// whole old table or the whole new one, never a half-updated role.
// =============================================================================

import { RoleDeclarationError } from './errors';
import { Permission, Role, RoleDeclaration, RoleEntry, RoleName, RoleTable } from '../types/roles';

const NO_PERMISSIONS: ReadonlySet<Permission> = new Set<Permission>();

export class RoleRegistry {
  private table: RoleTable = new Map();

  /** Build a registry from a static declaration */
  static fromDeclaration(declaration: RoleDeclaration | readonly RoleEntry[]): RoleRegistry {
    const registry = new RoleRegistry();
    registry.load(declaration);
    return registry;
  }

  /**
   * Register a role, or replace the permission set of an existing one.
   * Replacement does not merge: permissions missing from the new set are gone.
   * A redefined role keeps its original registration position.
   */
  define(roleName: RoleName, permissions: Iterable<Permission>): void {
    const next = new Map(this.table);
    next.set(roleName, toPermissionSet(roleName, permissions));
    this.table = next;
  }

  /**
   * Define every role of a declaration in a single swap. Validation happens
   * before the swap, so a bad declaration leaves the registry untouched.
   * An entry list registers in list order, whatever the role names look like.
   */
  load(declaration: RoleDeclaration | readonly RoleEntry[]): void {
    const entries = isEntryList(declaration) ? declaration : Object.entries(declaration);
    const next = new Map(this.table);
    for (const [roleName, permissions] of entries) {
      next.set(roleName, toPermissionSet(roleName, permissions));
    }
    this.table = next;
  }

  /** Permissions granted by a role. Unknown roles grant nothing. */
  permissionsOf(roleName: RoleName): ReadonlySet<Permission> {
    return this.table.get(roleName) ?? NO_PERMISSIONS;
  }

  has(roleName: RoleName): boolean {
    return this.table.has(roleName);
  }

  /** Role names in registration order */
  allRoleNames(): RoleName[] {
    return [...this.table.keys()];
  }

  roles(): Role[] {
    return [...this.table].map(([name, permissions]) => ({ name, permissions }));
  }

  /** The current table. Decisions read one snapshot from start to finish. */
  snapshot(): RoleTable {
    return this.table;
  }

  get size(): number {
    return this.table.size;
  }
}

function toPermissionSet(
  roleName: RoleName,
  permissions: Iterable<Permission>
): ReadonlySet<Permission> {
  if (typeof roleName !== 'string' || roleName.length === 0) {
    throw new RoleDeclarationError('Role names must be non-empty strings');
  }

  const set = new Set<Permission>();
  for (const permission of permissions) {
    if (typeof permission !== 'string' || permission.length === 0) {
      throw new RoleDeclarationError(
        `Role "${roleName}" declares an empty or non-string permission`
      );
    }
    set.add(permission);
  }
  return set;
}

function isEntryList(declaration: RoleDeclaration | readonly RoleEntry[]): declaration is readonly RoleEntry[] {
  return Array.isArray(declaration);
}
