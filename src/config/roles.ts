// =============================================================================
// GATEKEEP — Role Declaration Loader
//
// Reads config/roles.json at startup. Role names are validated here, at
// configuration time, because decisions treat unknown roles as granting
// nothing rather than failing.
// =============================================================================

import fs from 'fs';
import { config } from './index';
import { RoleDeclarationError } from '../authorization/errors';
import { RoleRegistry } from '../authorization/registry';
import { RoleDeclaration } from '../types/roles';

export function parseRoleDeclaration(raw: unknown, source = 'role declaration'): RoleDeclaration {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new RoleDeclarationError(`${source}: expected an object of role → permissions`);
  }

  const declaration: Record<string, string[]> = {};
  for (const [roleName, permissions] of Object.entries(raw)) {
    if (roleName.length === 0) {
      throw new RoleDeclarationError(`${source}: role names must be non-empty`);
    }
    if (
      !Array.isArray(permissions) ||
      !permissions.every((p): p is string => typeof p === 'string' && p.length > 0)
    ) {
      throw new RoleDeclarationError(
        `${source}: role "${roleName}" must list its permissions as non-empty strings`
      );
    }
    declaration[roleName] = permissions;
  }
  return declaration;
}

export function loadRoleDeclaration(file: string = config.roles.file): RoleDeclaration {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new RoleDeclarationError(`Could not read role declaration ${file}`, { cause: err });
  }
  return parseRoleDeclaration(raw, file);
}

/** Static declaration entry point: build a registry from roles and permissions */
export function defineRoles(declaration: RoleDeclaration): RoleRegistry {
  return RoleRegistry.fromDeclaration(parseRoleDeclaration(declaration));
}

/** Role names a principal source refers to that the registry does not define */
export function findUndeclaredRoles(
  registry: RoleRegistry,
  roleNames: Iterable<string>
): string[] {
  return [...new Set(roleNames)].filter((name) => !registry.has(name));
}
