// =============================================================================
// GATEKEEP — Role & Permission Types
//
// Roles are named bundles of permissions, declared once at startup.
// Permissions are bare string identifiers with no structure of their own.
// =============================================================================

/** Atomic capability identifier checked by guards */
export type Permission = string;

/** Case-sensitive role name, unique within a registry */
export type RoleName = string;

/** A role and the permissions it grants */
export interface Role {
  name: RoleName;
  permissions: ReadonlySet<Permission>;
}

/**
 * Static declaration of roles, as written in config/roles.json:
 *
 *   { "admin": ["create_user", "delete_user"], "user": ["view_profile"] }
 *
 * Key order is registration order, except that JavaScript lists integer-like
 * keys ("1", "42") first, in ascending order. Pass RoleEntry[] to
 * RoleRegistry.load when such names must keep their written order.
 */
export type RoleDeclaration = Readonly<Record<RoleName, readonly Permission[]>>;

/** One role of an ordered declaration: [name, permissions] */
export type RoleEntry = readonly [RoleName, Iterable<Permission>];

/** Immutable registry table. Swapped whole on every redefinition. */
export type RoleTable = ReadonlyMap<RoleName, ReadonlySet<Permission>>;
