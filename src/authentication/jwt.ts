// =============================================================================
// GATEKEEP — JWT Authenticator
//
// Verifies HS256 bearer JWTs. The principal is carried in the claims:
//   sub          — user ID
//   name         — display name (defaults to sub)
//   roles        — role names
//   permissions  — direct permissions
// =============================================================================

import jwt, { JsonWebTokenError, JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { AuthError } from '../authorization/errors';
import { principalFromRecord } from '../authorization/principal';
import { Principal } from '../types/auth';
import { IAuthenticator } from '../types/authentication';

export interface JwtAuthenticatorOptions {
  secret: string;
  /** When set, tokens must carry this `iss` claim */
  issuer?: string;
}

/** Claims written by issueToken and read by JwtAuthenticator */
export interface PrincipalClaims extends JwtPayload {
  sub: string;
  name?: string;
  roles?: string[];
  permissions?: string[];
}

export class JwtAuthenticator implements IAuthenticator {
  readonly name = 'jwt';

  constructor(private readonly options: JwtAuthenticatorOptions) {}

  async authenticateToken(token: string, signal?: AbortSignal): Promise<Principal> {
    signal?.throwIfAborted();

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        ...(this.options.issuer ? { issuer: this.options.issuer } : {}),
      });
    } catch (err) {
      // TokenExpiredError extends JsonWebTokenError; check it first
      if (err instanceof TokenExpiredError) {
        throw new AuthError('ExpiredToken', { cause: err });
      }
      if (err instanceof JsonWebTokenError) {
        throw new AuthError('InvalidToken', { cause: err });
      }
      throw err;
    }

    if (typeof payload === 'string') {
      throw new AuthError('InvalidToken');
    }

    return principalFromRecord({
      id: payload.sub,
      displayName: payload.name ?? payload.sub,
      roles: payload.roles,
      permissions: payload.permissions,
    });
  }
}

/**
 * Sign a token for a principal. Development and tests only: issuing tokens
 * in production belongs to the identity provider.
 */
export function issueToken(
  principal: Principal,
  options: JwtAuthenticatorOptions & { expiresInSeconds: number }
): string {
  const claims: PrincipalClaims = {
    sub: principal.id,
    name: principal.displayName,
    roles: [...principal.roles],
    permissions: [...principal.directPermissions],
  };
  return jwt.sign(claims, options.secret, {
    algorithm: 'HS256',
    expiresIn: options.expiresInSeconds,
    ...(options.issuer ? { issuer: options.issuer } : {}),
  });
}
