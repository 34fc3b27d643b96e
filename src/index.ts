// =============================================================================
// GATEKEEP — Public API
// =============================================================================

export * from './types/roles';
export * from './types/auth';
export * from './types/authentication';

export { RoleRegistry } from './authorization/registry';
export {
  createPrincipal,
  copyPrincipal,
  withRoles,
  withPermissions,
  principalFromRecord,
  toPrincipalRecord,
} from './authorization/principal';
export type { PrincipalInit } from './authorization/principal';
export {
  hasRole,
  hasPermission,
  effectivePermissions,
  check,
  requiresRole,
  requiresPermission,
} from './authorization/decision';
export { AuthorizationContext } from './authorization/context';
export type { AuthorizationOutcome, AuthorizationContextOptions } from './authorization/context';
export {
  AuthError,
  isAuthError,
  RoleDeclarationError,
  AuthenticatorNotRegisteredError,
} from './authorization/errors';

export { MemoryAuthenticator, parseTokenFile } from './authentication/memory';
export { JwtAuthenticator, issueToken } from './authentication/jwt';
export { PostgresAuthenticator } from './authentication/postgres';
export { createAuthenticator } from './authentication/factory';

export { defineRoles, loadRoleDeclaration, parseRoleDeclaration, findUndeclaredRoles } from './config/roles';

export { authenticate, readBearerToken, statusForAuthError } from './middleware/authenticate';
export { requireAccess, requireRole, requirePermission, guard } from './middleware/role-guard';
export { createApp } from './app';
export { createLogger } from './services/logger';
export type { Logger } from './services/logger';
