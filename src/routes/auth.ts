// =============================================================================
// GATEKEEP — Authentication Routes
//
// Session introspection for the bearer of a token. Issuing tokens is the
// identity provider's job, not this service's.
// =============================================================================

import { Router, Request, Response } from 'express';
import '../types/express';
import { AuthorizationContext } from '../authorization/context';
import { toPrincipalRecord } from '../authorization/principal';
import { authenticate } from '../middleware/authenticate';

export function authRoutes(context: AuthorizationContext): Router {
  const router = Router();

  /**
   * GET /api/auth/session
   * The caller's principal and effective permission set.
   */
  router.get('/session', authenticate(context), (req: Request, res: Response) => {
    if (!req.user) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    res.json({
      user: toPrincipalRecord(req.user),
      effectivePermissions: [...context.effectivePermissions(req.user)].sort(),
    });
  });

  return router;
}
