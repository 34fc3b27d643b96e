// =============================================================================
// GATEKEEP — Authorization Context
//
// The application context the guard adapter is built from: one role
// registry and one active authenticator slot. Tests construct their own.
//
// Per-attempt state machine (authorize):
//
//   Received → Authenticating ─┬─ Authenticated → Deciding ─┬─ Allowed
//                              │                            └─ Denied
//                              └─ AuthFailed
//
// No retries happen here; retry policy belongs to the caller.
// =============================================================================

import { check, describeRequirement, effectivePermissions, hasPermission, hasRole } from './decision';
import { AuthError, AuthenticatorNotRegisteredError, isAuthError } from './errors';
import { RoleRegistry } from './registry';
import { createLogger, Logger } from '../services/logger';
import { AuthRequirement, Principal } from '../types/auth';
import { IAuthenticator } from '../types/authentication';
import { Permission, RoleName } from '../types/roles';

export type AuthorizationOutcome =
  | { outcome: 'allowed'; principal: Principal }
  | { outcome: 'denied'; error: AuthError }
  | { outcome: 'auth_failed'; error: AuthError };

export interface AuthorizationContextOptions {
  registry: RoleRegistry;
  authenticator?: IAuthenticator;
  logger?: Logger;
}

export class AuthorizationContext {
  readonly registry: RoleRegistry;
  private authenticator: IAuthenticator | undefined;
  private readonly logger: Logger;

  constructor(options: AuthorizationContextOptions) {
    this.registry = options.registry;
    this.authenticator = options.authenticator;
    this.logger = options.logger ?? createLogger('Authz');
  }

  /**
   * Install the active authenticator, replacing any previous one.
   * Authentications already running keep the instance they started with.
   */
  registerAuthenticator(authenticator: IAuthenticator): void {
    const previous = this.authenticator;
    this.authenticator = authenticator;
    this.logger.info(
      previous
        ? `Authenticator "${previous.name}" replaced by "${authenticator.name}"`
        : `Authenticator "${authenticator.name}" registered`
    );
  }

  get activeAuthenticator(): IAuthenticator | undefined {
    return this.authenticator;
  }

  async authenticateToken(token: string, signal?: AbortSignal): Promise<Principal> {
    const authenticator = this.authenticator;
    if (!authenticator) {
      throw new AuthenticatorNotRegisteredError();
    }
    signal?.throwIfAborted();
    return authenticator.authenticateToken(token, signal);
  }

  hasRole(principal: Principal, role: RoleName): boolean {
    return hasRole(principal, role);
  }

  hasPermission(principal: Principal, permission: Permission): boolean {
    return hasPermission(principal, permission, this.registry);
  }

  effectivePermissions(principal: Principal): Set<Permission> {
    return effectivePermissions(principal, this.registry);
  }

  check(principal: Principal, requirement: AuthRequirement): boolean {
    return check(principal, requirement, this.registry);
  }

  /**
   * Authenticate the token, then check the requirement.
   *
   * Authenticator AuthErrors come back unchanged as `auth_failed`.
   * A failed check comes back as `denied` with a bare Unauthorized error.
   * Anything else (cancellation, a missing authenticator, a bug inside an
   * authenticator) rejects the returned promise.
   */
  async authorize(
    token: string,
    requirement: AuthRequirement,
    signal?: AbortSignal
  ): Promise<AuthorizationOutcome> {
    let principal: Principal;
    try {
      principal = await this.authenticateToken(token, signal);
    } catch (err) {
      if (!isAuthError(err)) throw err;
      this.logger.info(`Authentication failed: ${err.kind}`);
      return { outcome: 'auth_failed', error: err };
    }

    if (!this.check(principal, requirement)) {
      this.logger.debug(`Denied ${principal.id} (${describeRequirement(requirement)})`);
      return { outcome: 'denied', error: new AuthError('Unauthorized') };
    }

    this.logger.debug(`Allowed ${principal.id} (${describeRequirement(requirement)})`);
    return { outcome: 'allowed', principal };
  }
}
