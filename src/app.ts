/**
 * sweepbench - Express Application
 *
 * Middleware, health endpoints, API routes and error handling. Kept apart
 * from the entry point so the HTTP surface can be exercised without hardware.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { v4 as uuidv4 } from 'uuid';

import { config } from './config.js';
import { log } from './utils/logger.js';
import { handleError } from './utils/errors.js';
import { encodeNonFinite } from './utils/json.js';
import { createApiRoutes, SessionProvider } from './api/routes.js';
import { getBenchSession } from './state.js';

export function createApp(getSession: SessionProvider = getBenchSession): Express {
  const app: Express = express();
  app.set('json replacer', encodeNonFinite);

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' ? header : uuidv4();

    res.setHeader('X-Request-ID', requestId);
    res.locals.requestId = requestId;

    res.on('finish', () => {
      log.info(`${req.method} ${req.path}`, {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });

    next();
  });

  // Health check endpoints
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: config.serviceId,
      version: config.version,
      buildId: config.buildId,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    const session = getSession();
    const ready = session !== null && session.link.isConnected();
    res.status(ready ? 200 : 503).json({ ready });
  });

  app.get('/live', (_req: Request, res: Response) => {
    res.json({ alive: true });
  });

  // API routes
  app.use('/api/v1', createApiRoutes(getSession));

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const error = handleError(err);
    const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;

    if (error.statusCode >= 500) {
      log.error('Request failed', err, { requestId, method: req.method, path: req.path, code: error.code });
    } else {
      log.warn('Request rejected', { requestId, method: req.method, path: req.path, code: error.code, error: error.message });
    }

    res.status(error.statusCode).json({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(config.nodeEnv === 'development' && {
          context: error.context,
          stack: error.stack,
        }),
      },
      metadata: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
    });
  });

  return app;
}
