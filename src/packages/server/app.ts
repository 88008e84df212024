/**
 * Express Application
 * Main Express app configuration
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import routes from './routes/index.js';
import { createAuthMiddleware, getAuthTokenPreview } from './auth/index.js';
import type { ViewerConfig } from './config/viewer-config.js';
import { logger } from './utils/logger.js';

export function createApp(config: Pick<ViewerConfig, 'authToken'>): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.http.verbose(`${req.method} ${req.path}`);
    next();
  });

  // Authentication middleware (must be before routes)
  app.use('/api', createAuthMiddleware(config.authToken));

  if (config.authToken) {
    logger.server.log(`Authentication enabled (token: ${getAuthTokenPreview(config.authToken)})`);
  } else {
    logger.server.log('Authentication disabled (no AUTH_TOKEN set)');
  }

  // API routes
  app.use('/api', routes);

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.http.error('Request error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
