// =============================================================================
// GATEKEEP — Principal Model
//
// Principals are frozen values. The with* helpers return a new principal
// rather than editing the one they are given.
// =============================================================================

import { AuthError } from './errors';
import { Principal, PrincipalRecord } from '../types/auth';
import { Permission, RoleName } from '../types/roles';

export interface PrincipalInit {
  id: string;
  displayName: string;
  roles?: Iterable<RoleName>;
  permissions?: Iterable<Permission>;
}

/** A Set that refuses changes once construction has filled it */
class SealedSet<T> extends Set<T> {
  private sealed: boolean;

  constructor(values: Iterable<T>) {
    super(values);
    this.sealed = true;
    Object.freeze(this);
  }

  add(value: T): this {
    if (this.sealed) throw new TypeError('Principal permissions are read-only');
    return super.add(value);
  }

  delete(_value: T): boolean {
    throw new TypeError('Principal permissions are read-only');
  }

  clear(): void {
    throw new TypeError('Principal permissions are read-only');
  }
}

export function createPrincipal(init: PrincipalInit): Principal {
  return Object.freeze({
    id: init.id,
    displayName: init.displayName,
    roles: Object.freeze([...new Set(init.roles ?? [])]),
    directPermissions: new SealedSet(init.permissions ?? []),
  });
}

/** A new principal with the same identity, roles and permissions */
export function copyPrincipal(principal: Principal): Principal {
  return createPrincipal({
    id: principal.id,
    displayName: principal.displayName,
    roles: principal.roles,
    permissions: principal.directPermissions,
  });
}

export function withRoles(principal: Principal, ...roles: RoleName[]): Principal {
  return createPrincipal({
    id: principal.id,
    displayName: principal.displayName,
    roles: [...principal.roles, ...roles],
    permissions: principal.directPermissions,
  });
}

export function withPermissions(principal: Principal, ...permissions: Permission[]): Principal {
  return createPrincipal({
    id: principal.id,
    displayName: principal.displayName,
    roles: principal.roles,
    permissions: [...principal.directPermissions, ...permissions],
  });
}

export function toPrincipalRecord(principal: Principal): PrincipalRecord {
  return {
    id: principal.id,
    displayName: principal.displayName,
    roles: [...principal.roles],
    permissions: [...principal.directPermissions].sort(),
  };
}

/**
 * Parse an untrusted record (token file entry, JWT claims) into a principal.
 * Anything malformed is an InvalidToken: the record came from a token.
 */
export function principalFromRecord(raw: unknown): Principal {
  if (typeof raw !== 'object' || raw === null) {
    throw new AuthError('InvalidToken');
  }

  const fields = new Map<string, unknown>(Object.entries(raw));
  const id = fields.get('id');
  const displayName = fields.get('displayName') ?? id;
  if (typeof id !== 'string' || id.length === 0 || typeof displayName !== 'string') {
    throw new AuthError('InvalidToken');
  }

  return createPrincipal({
    id,
    displayName,
    roles: readStringList(fields, 'roles'),
    permissions: readStringList(fields, 'permissions'),
  });
}

function readStringList(fields: Map<string, unknown>, key: string): string[] {
  const value = fields.get(key);
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new AuthError('InvalidToken');
  }
  return value;
}
