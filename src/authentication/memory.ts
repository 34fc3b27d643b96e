// =============================================================================
// GATEKEEP — In-Memory Authenticator
//
// Static token → principal table. The simplest possible authenticator,
// used for local development (config/tokens.json) and tests.
// =============================================================================

import fs from 'fs';
import { AuthError } from '../authorization/errors';
import { copyPrincipal, principalFromRecord } from '../authorization/principal';
import { Principal } from '../types/auth';
import { IAuthenticator } from '../types/authentication';

export interface MemoryTokenEntry {
  principal: Principal;
  /** Tokens without an expiry never lapse */
  expiresAt?: Date;
}

export class MemoryAuthenticator implements IAuthenticator {
  readonly name = 'memory';
  private readonly tokens = new Map<string, MemoryTokenEntry>();

  constructor(
    entries: Iterable<[string, MemoryTokenEntry]> = [],
    private readonly now: () => number = Date.now
  ) {
    for (const [token, entry] of entries) {
      this.issue(token, entry.principal, entry.expiresAt);
    }
  }

  /**
   * Load a token file of the form
   *   { "<token>": { "id", "displayName", "roles", "permissions", "expiresAt"? } }
   */
  static fromFile(file: string): MemoryAuthenticator {
    return new MemoryAuthenticator(parseTokenFile(JSON.parse(fs.readFileSync(file, 'utf8'))));
  }

  issue(token: string, principal: Principal, expiresAt?: Date): void {
    this.tokens.set(token, { principal: copyPrincipal(principal), expiresAt });
  }

  revoke(token: string): boolean {
    return this.tokens.delete(token);
  }

  async authenticateToken(token: string, signal?: AbortSignal): Promise<Principal> {
    signal?.throwIfAborted();

    const entry = this.tokens.get(token);
    if (!entry) {
      throw new AuthError('InvalidToken');
    }
    if (entry.expiresAt && entry.expiresAt.getTime() <= this.now()) {
      throw new AuthError('ExpiredToken');
    }
    // A fresh principal per call: nothing a caller does to it reaches the table
    return copyPrincipal(entry.principal);
  }

  /** Every role name referenced by the table, for configuration checks */
  referencedRoles(): string[] {
    return [...this.tokens.values()].flatMap((entry) => [...entry.principal.roles]);
  }
}

export function parseTokenFile(raw: unknown): Array<[string, MemoryTokenEntry]> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Token file must be an object of token → user');
  }

  return Object.entries(raw).map(([token, record]): [string, MemoryTokenEntry] => {
    let principal: Principal;
    try {
      principal = principalFromRecord(record);
    } catch (err) {
      throw new Error(`Token file entry "${token}" is not a valid user record`, { cause: err });
    }
    return [token, { principal, expiresAt: readExpiry(token, record) }];
  });
}

function readExpiry(token: string, record: unknown): Date | undefined {
  if (typeof record !== 'object' || record === null) return undefined;
  const value = new Map<string, unknown>(Object.entries(record)).get('expiresAt');
  if (value === undefined) return undefined;

  const expiresAt = typeof value === 'string' ? new Date(value) : undefined;
  if (!expiresAt || Number.isNaN(expiresAt.getTime())) {
    throw new Error(`Token file entry "${token}" has an invalid expiresAt`);
  }
  return expiresAt;
}
