import session from 'express-session';
import type { RequestHandler } from 'express';
import connectPg from 'connect-pg-simple';
import type { Pool } from 'pg';
import type { AppConfig } from '../core/config';
import { logger } from '../core/logger';

/**
 * Session middleware. Sessions live in Postgres when a pool is supplied and
 * in the process-local MemoryStore otherwise.
 */
export function getSession(config: AppConfig, pool?: Pool): RequestHandler {
  const cookieConfig = {
    httpOnly: true,
    secure: config.isProduction,
    sameSite: config.isProduction ? 'none' as const : 'lax' as const,
    maxAge: config.sessionTtlMs,
  };

  if (!pool) {
    if (config.isProduction) {
      throw new Error('[Session] FATAL: a Postgres session store is required in production');
    }
    logger.info('[Session] Using MemoryStore');
    return session({
      name: 'sid',
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  }

  const PgStore = connectPg(session);
  const sessionStore = new PgStore({
    pool,
    createTableIfMissing: true,
    ttl: Math.floor(config.sessionTtlMs / 1000),
    tableName: 'sessions',
    errorLog: (err: Error) => {
      logger.error('[Session Store] Error:', { extra: { message: err.message } });
    },
  });

  logger.info('[Session] Using Postgres session store');
  return session({
    name: 'sid',
    secret: config.sessionSecret,
    store: sessionStore,
    resave: false,
    saveUninitialized: false,
    proxy: config.isProduction,
    cookie: cookieConfig,
  });
}
