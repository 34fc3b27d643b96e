// =============================================================================
// GATEKEEP — Test Helpers
//
// In-process fixtures: a registry, principals and a context wired to a
// memory authenticator. Nothing here touches the network.
// =============================================================================

import { AuthorizationContext } from '../src/authorization/context';
import { createPrincipal } from '../src/authorization/principal';
import { RoleRegistry } from '../src/authorization/registry';
import { MemoryAuthenticator } from '../src/authentication/memory';
import { createLogger } from '../src/services/logger';
import { Principal } from '../src/types/auth';
import { IAuthenticator } from '../src/types/authentication';

export const silentLogger = createLogger('Test', 'silent');

export const ROLES = {
  admin: ['delete_user'],
  user: ['view_profile'],
} as const;

/** Registry = { admin: {delete_user}, user: {view_profile} } */
export function buildRegistry(): RoleRegistry {
  return RoleRegistry.fromDeclaration(ROLES);
}

export const alice: Principal = createPrincipal({
  id: '123',
  displayName: 'alice',
  roles: ['user'],
  permissions: ['custom_permission'],
});

export const root: Principal = createPrincipal({
  id: '1',
  displayName: 'root',
  roles: ['admin'],
});

/** Tokens: "alice-token", "root-token", and "stale" (expired) */
export function buildAuthenticator(): MemoryAuthenticator {
  const authenticator = new MemoryAuthenticator([
    ['alice-token', { principal: alice }],
    ['root-token', { principal: root }],
  ]);
  authenticator.issue('stale', alice, new Date('2000-01-01T00:00:00.000Z'));
  return authenticator;
}

export function buildContext(authenticator: IAuthenticator = buildAuthenticator()): AuthorizationContext {
  return new AuthorizationContext({
    registry: buildRegistry(),
    authenticator,
    logger: silentLogger,
  });
}

/** A promise plus the functions that settle it */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
