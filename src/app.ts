import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { createRateLimiter } from './infra/rateLimiter.js';
import { logger } from './infra/logger.js';
import type { Env } from './infra/env.js';
import type { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import type { JobService } from './services/JobService.js';

export interface AppDependencies {
  env: Env;
  db: DatabaseAdapter;
  jobService: JobService;
}

/**
 * Builds the HTTP application without binding a port.
 */
export function createApp({ env, db, jobService }: AppDependencies): Express {
  const app = express();

  app.set('trust proxy', env.NODE_ENV === 'production');

  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    try {
      if (!db.ping()) {
        res.status(503).json({ status: 'not-ready' });
        return;
      }
      res.json({ status: 'ready' });
    } catch (error) {
      logger.warn('Readiness probe failed', { error });
      res.status(503).json({ status: 'not-ready' });
    }
  });

  app.use(
    '/discoveries',
    createRateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS })
  );

  app.use(
    createApiRouter({
      jobService,
      options: {
        maxUploadBytes: env.MAX_UPLOAD_MB * 1024 * 1024,
        publicBaseUrl: env.PUBLIC_BASE_URL,
      },
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(env));

  return app;
}
