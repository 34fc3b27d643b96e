// =============================================================================
// GATEKEEP — Example Protected Routes
//
// One route per guard style, against the roles in config/roles.json.
// =============================================================================

import { Router, Request, Response } from 'express';
import '../types/express';
import { AuthorizationContext } from '../authorization/context';
import { requiresPermission } from '../authorization/decision';
import { authenticate } from '../middleware/authenticate';
import { guard, requirePermission, requireRole } from '../middleware/role-guard';

export function protectedRoutes(context: AuthorizationContext): Router {
  const router = Router();

  router.get(
    '/admin',
    authenticate(context),
    requireRole(context, 'admin'),
    (req: Request, res: Response) => {
      res.json({ message: 'Welcome, admin!', userId: req.user?.id });
    }
  );

  router.get(
    '/profile/edit',
    authenticate(context),
    requirePermission(context, 'edit_profile'),
    (_req: Request, res: Response) => {
      res.json({ message: 'Edit your profile here' });
    }
  );

  router.get(
    '/special',
    guard(context, requiresPermission('special_access'), (_req: Request, res: Response) => {
      res.json({ message: 'This is a special area!' });
    })
  );

  router.get('/public', (_req: Request, res: Response) => {
    res.json({ message: 'This is a public route!' });
  });

  return router;
}
