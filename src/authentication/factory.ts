// =============================================================================
// GATEKEEP — Authenticator Factory
//
// Returns the IAuthenticator selected by AUTH_PROVIDER. Exactly one is
// installed in the AuthorizationContext at a time.
// =============================================================================

import { config, AuthSettings } from '../config';
import { createPool, poolQuery } from '../db/pool';
import { IAuthenticator } from '../types/authentication';
import { JwtAuthenticator } from './jwt';
import { MemoryAuthenticator } from './memory';
import { PostgresAuthenticator } from './postgres';

export function createAuthenticator(settings: AuthSettings = config.auth): IAuthenticator {
  switch (settings.provider) {
    case 'memory':
      return MemoryAuthenticator.fromFile(settings.tokensFile);

    case 'jwt':
      return new JwtAuthenticator({
        secret: settings.jwt.secret,
        issuer: settings.jwt.issuer,
      });

    case 'postgres':
      return new PostgresAuthenticator(poolQuery(createPool(settings.db.connectionString)));
  }
}
