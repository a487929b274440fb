import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import { sql } from 'drizzle-orm';
import type { Pool } from 'pg';
import type { Database } from './db';
import type { AppConfig } from './core/config';
import { createErrorResponse, logAndRespond, logRequest, requestIdMiddleware } from './core/logger';
import { getErrorProperty } from './utils/errorUtils';
import { createRateLimiters } from './middleware/rateLimiting';
import { getSession } from './auth/session';
import { registerRoutes } from './loaders/routes';
import { getStartupHealth } from './loaders/startup';

export interface CreateAppOptions {
  config: AppConfig;
  db: Database;
  /** Backs the session store; without it sessions stay in memory. */
  sessionPool?: Pool;
}

export function createApp({ config, db, sessionPool }: CreateAppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  if (config.isProduction) {
    app.set('trust proxy', 1);
  }

  app.use((req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'SAMEORIGIN');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (config.isProduction) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use(requestIdMiddleware);
  app.use(logRequest);
  app.use(cors({
    origin: config.corsOrigins === '*' ? true : config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(getSession(config, sessionPool));

  const limiters = createRateLimiters(config);
  app.use(limiters.global);

  app.get('/api/health', async (req, res) => {
    try {
      await db.execute(sql`SELECT 1`);
      res.json({
        status: 'ok',
        database: 'connected',
        startup: getStartupHealth().database,
        time: new Date().toISOString(),
      });
    } catch (error: unknown) {
      logAndRespond(req, res, 503, 'Database unavailable', error);
    }
  });

  registerRoutes(app, { db, config, limiters });

  app.use('/api', (req, res) => {
    res.status(404).json(createErrorResponse(req, 'Not found', 'NOT_FOUND'));
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    // body-parser marks malformed JSON with this type
    if (getErrorProperty(err, 'type') === 'entity.parse.failed') {
      return res.status(400).json(createErrorResponse(req, 'Malformed JSON body', 'VALIDATION_ERROR'));
    }
    if (getErrorProperty(err, 'type') === 'entity.too.large') {
      return res.status(413).json(createErrorResponse(req, 'Request body too large', 'PAYLOAD_TOO_LARGE'));
    }
    logAndRespond(req, res, 500, 'Internal server error', err);
  });

  return app;
}
