// =============================================================================
// GATEKEEP — Request Tracing & Error Handling Middleware
// =============================================================================

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import '../types/express';
import { config } from '../config';
import { createLogger } from '../services/logger';

const logger = createLogger('Server');

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || uuidv4();
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

/**
 * Global error handler. Never leaks stack traces in production.
 */
export function errorHandler(nodeEnv: string = config.nodeEnv): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const isProd = nodeEnv === 'production';
    const error = err instanceof Error ? err : new Error(String(err));

    logger.error(`${req.requestId ?? '-'} ${error.message}`, isProd ? '' : error.stack);

    res.status(500).json({
      error: isProd ? 'Internal server error' : error.message,
      ...(isProd ? {} : { stack: error.stack }),
    });
  };
}

export function notFound(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  };
}
