// =============================================================================
// GATEKEEP — Authenticator Interface
//
// The one pluggable boundary of the engine: "given a bearer token, resolve a
// Principal or fail". Implementations may hit a database, a cache or verify a
// signature; the engine never does I/O itself.
//
// Implementations:
//   MemoryAuthenticator   — static token table (development, tests)
//   JwtAuthenticator      — signed bearer JWTs
//   PostgresAuthenticator — tokens/users/user_roles/user_permissions tables
// =============================================================================

import { Principal } from './auth';

export interface IAuthenticator {
  /** Human-readable name of this authenticator (for logging) */
  readonly name: string;

  /**
   * Resolve a bearer token to a principal.
   *
   * Rejects with AuthError:
   *   InvalidToken        — unknown, malformed or wrongly signed token
   *   ExpiredToken        — the token was valid once and has lapsed
   *   ProviderUnavailable — the backing store could not be reached
   *
   * When `signal` aborts, pending I/O is abandoned and the promise rejects
   * with the signal's reason.
   */
  authenticateToken(token: string, signal?: AbortSignal): Promise<Principal>;
}
