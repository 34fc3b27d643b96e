// =============================================================================
// GATEKEEP — Error Types
//
// AuthError messages are fixed per kind. An Unauthorized error never says
// which role or permission was required, or what the caller actually held.
// =============================================================================

import { AuthErrorKind } from '../types/auth';

const AUTH_ERROR_MESSAGES: Record<AuthErrorKind, string> = {
  InvalidToken: 'Invalid token',
  ExpiredToken: 'Token expired',
  ProviderUnavailable: 'Authentication provider unavailable',
  Unauthorized: 'Forbidden',
};

export class AuthError extends Error {
  readonly kind: AuthErrorKind;

  constructor(kind: AuthErrorKind, options?: { cause?: unknown }) {
    super(AUTH_ERROR_MESSAGES[kind], options);
    this.name = 'AuthError';
    this.kind = kind;
  }
}

export function isAuthError(err: unknown): err is AuthError {
  return err instanceof AuthError;
}

/** Thrown at startup when a role declaration is malformed */
export class RoleDeclarationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RoleDeclarationError';
  }
}

/** Thrown when a token is presented before any authenticator is installed */
export class AuthenticatorNotRegisteredError extends Error {
  constructor() {
    super('Auth provider not registered');
    this.name = 'AuthenticatorNotRegisteredError';
  }
}
