// =============================================================================
// GATEKEEP — Role & Permission Guards
//
// Two ways to protect a route, both composed at route registration:
//
//   router.get('/admin', authenticate(ctx), requireRole(ctx, 'admin'), handler)
//   router.get('/special', guard(ctx, requiresPermission('special_access'), handler))
//
// A protected route declares exactly one role or one permission. A denial
// answers 403 with no hint of what was required.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import '../types/express';
import { AuthorizationContext } from '../authorization/context';
import { requiresPermission, requiresRole } from '../authorization/decision';
import { AuthError } from '../authorization/errors';
import { AuthRequirement } from '../types/auth';
import { Permission, RoleName } from '../types/roles';
import { clientDisconnectSignal, readBearerToken, sendAuthError } from './authenticate';

/**
 * Returns middleware that checks the requirement against req.user.
 * Must be used AFTER authenticate middleware.
 */
export function requireAccess(
  context: AuthorizationContext,
  requirement: AuthRequirement
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    if (!context.check(req.user, requirement)) {
      sendAuthError(res, new AuthError('Unauthorized'));
      return;
    }

    next();
  };
}

export function requireRole(context: AuthorizationContext, role: RoleName): RequestHandler {
  return requireAccess(context, requiresRole(role));
}

export function requirePermission(
  context: AuthorizationContext,
  permission: Permission
): RequestHandler {
  return requireAccess(context, requiresPermission(permission));
}

/**
 * Wrap a handler so it only runs for callers meeting the requirement.
 * Runs the whole authorize() state machine: no separate authenticate
 * middleware is needed in front of it.
 */
export function guard(
  context: AuthorizationContext,
  requirement: AuthRequirement,
  handler: RequestHandler
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const bearer = readBearerToken(req.headers.authorization);
    if (!bearer.ok) {
      res.status(401).json({ error: bearer.error });
      return;
    }

    const signal = clientDisconnectSignal(res);
    try {
      const result = await context.authorize(bearer.token, requirement, signal);
      if (result.outcome !== 'allowed') {
        sendAuthError(res, result.error);
        return;
      }
      req.user = result.principal;
    } catch (err) {
      if (!signal.aborted) next(err);
      return;
    }

    // Errors from the wrapped handler, sync or async, go to the error handler
    try {
      const returned: unknown = handler(req, res, next);
      if (returned instanceof Promise) returned.catch(next);
    } catch (err) {
      next(err);
    }
  };
}
