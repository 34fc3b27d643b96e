// =============================================================================
// GATEKEEP — Authentication Middleware
//
// Extracts the Bearer token, resolves it through the context's active
// authenticator, and attaches the principal to req.user.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { AuthorizationContext } from '../authorization/context';
import { isAuthError } from '../authorization/errors';
import { AuthErrorKind } from '../types/auth';

const AUTH_ERROR_STATUS: Record<AuthErrorKind, number> = {
  InvalidToken: 401,
  ExpiredToken: 401,
  ProviderUnavailable: 503,
  Unauthorized: 403,
};

export type BearerToken =
  | { ok: true; token: string }
  | { ok: false; error: string };

/** Parse an Authorization header value */
export function readBearerToken(header: string | undefined): BearerToken {
  if (!header) {
    return { ok: false, error: 'Authorization header is required' };
  }
  if (!header.startsWith('Bearer ') || header.slice(7).trim() === '') {
    return { ok: false, error: 'Invalid authorization format' };
  }
  return { ok: true, token: header.slice(7).trim() };
}

/** HTTP status for an AuthError kind */
export function statusForAuthError(kind: AuthErrorKind): number {
  return AUTH_ERROR_STATUS[kind];
}

/** Respond to an AuthError. The body is the fixed message for its kind. */
export function sendAuthError(res: Response, error: { kind: AuthErrorKind; message: string }): void {
  res.status(statusForAuthError(error.kind)).json({ error: error.message });
}

/**
 * An AbortSignal that fires when the client goes away before the response
 * is written, so authenticators can drop pending lookups.
 */
export function clientDisconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort(new Error('Client disconnected'));
  });
  return controller.signal;
}

/**
 * Authenticate incoming requests via Bearer token.
 * Errors other than AuthError go to the Express error handler.
 */
export function authenticate(context: AuthorizationContext): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const bearer = readBearerToken(req.headers.authorization);
    if (!bearer.ok) {
      res.status(401).json({ error: bearer.error });
      return;
    }

    const signal = clientDisconnectSignal(res);
    try {
      req.user = await context.authenticateToken(bearer.token, signal);
    } catch (err) {
      if (isAuthError(err)) {
        sendAuthError(res, err);
      } else if (!signal.aborted) {
        next(err);
      }
      return;
    }
    next();
  };
}
