// =============================================================================
// GATEKEEP — PostgreSQL Authenticator
//
// Resolves opaque bearer tokens against:
//
//   tokens            (token PK, user_id, expires_at)
//   users             (id PK, username)
//   user_roles        (user_id, role)
//   user_permissions  (user_id, permission)
//
// Only reads. A cancelled authentication leaves nothing behind.
// =============================================================================

import { AuthError } from '../authorization/errors';
import { createPrincipal } from '../authorization/principal';
import { QueryFn, QueryRow } from '../db/pool';
import { Principal } from '../types/auth';
import { IAuthenticator } from '../types/authentication';

export class PostgresAuthenticator implements IAuthenticator {
  readonly name = 'postgres';

  constructor(private readonly query: QueryFn) {}

  async authenticateToken(token: string, signal?: AbortSignal): Promise<Principal> {
    const tokenRows = await this.run(
      `SELECT t.user_id, u.username, t.expires_at > now() AS active
       FROM tokens t
       JOIN users u ON u.id = t.user_id
       WHERE t.token = $1`,
      [token],
      signal
    );

    // Unknown token, or a token whose user no longer exists
    if (tokenRows.length === 0) {
      throw new AuthError('InvalidToken');
    }

    const record = tokenRows[0];
    if (record.active !== true) {
      throw new AuthError('ExpiredToken');
    }

    const userId = String(record.user_id);

    const roleRows = await this.run(
      `SELECT role FROM user_roles WHERE user_id = $1 ORDER BY role`,
      [userId],
      signal
    );
    const permissionRows = await this.run(
      `SELECT permission FROM user_permissions WHERE user_id = $1 ORDER BY permission`,
      [userId],
      signal
    );

    return createPrincipal({
      id: userId,
      displayName: typeof record.username === 'string' ? record.username : userId,
      roles: roleRows.map((r) => String(r.role)),
      permissions: permissionRows.map((r) => String(r.permission)),
    });
  }

  private async run(text: string, params: unknown[], signal?: AbortSignal): Promise<QueryRow[]> {
    signal?.throwIfAborted();
    try {
      const result = await raceAbort(this.query(text, params), signal);
      return result.rows;
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      throw new AuthError('ProviderUnavailable', { cause: err });
    }
  }
}

/** Settle with `work`, or reject with the abort reason as soon as `signal` fires */
function raceAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
