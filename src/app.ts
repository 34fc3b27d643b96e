// =============================================================================
// GATEKEEP — Express Application
//
//   /api/health   — Health check (unauthenticated)
//   /api/auth/*   — Session introspection (rate-limited)
//   /api/*        — Example protected routes
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import { AuthorizationContext } from './authorization/context';
import { errorHandler, notFound, requestId } from './middleware/security';
import { authRoutes } from './routes/auth';
import { protectedRoutes } from './routes/protected';

export const VERSION = '0.1.0';

export function createApp(context: AuthorizationContext): Express {
  const app = express();
  const startTime = Date.now();

  app.use(helmet());
  app.use(cors({
    origin: config.nodeEnv === 'development' ? '*' : undefined,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());

  const authLimiter = rateLimit({
    windowMs: config.rateLimit.authWindowMs,
    limit: config.rateLimit.authMax,
    message: { error: 'Too many authentication attempts. Try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.get('/api/health', (_req, res) => {
    const authenticator = context.activeAuthenticator;
    res.status(authenticator ? 200 : 503).json({
      status: authenticator ? 'healthy' : 'degraded',
      service: 'gatekeep',
      version: VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks: {
        authenticator: authenticator ? authenticator.name : 'unregistered',
        roles: context.registry.size,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/auth', authLimiter, authRoutes(context));
  app.use('/api', protectedRoutes(context));

  app.use(notFound());
  app.use(errorHandler());

  return app;
}
