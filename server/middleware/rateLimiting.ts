import rateLimit from 'express-rate-limit';
import type { Request, Response, RequestHandler } from 'express';
import type { AppConfig } from '../core/config';
import { logger } from '../core/logger';

const getClientKey = (req: Request): string => {
  const userId = req.session?.user?.id;
  if (userId) {
    return `user:${userId}`;
  }
  return req.ip || 'unknown';
};

export interface RateLimiters {
  global: RequestHandler;
  auth: RequestHandler;
  booking: RequestHandler;
}

export function createRateLimiters(config: AppConfig): RateLimiters {
  const global = rateLimit({
    windowMs: 60 * 1000,
    max: config.rateLimits.global,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: getClientKey,
    validate: false,
    handler: (req: Request, res: Response) => {
      logger.warn(`[RateLimit] Global limit exceeded for ${getClientKey(req)} on ${req.path}`);
      res.status(429).json({ error: 'Too many requests. Please slow down.' });
    },
    skip: (req) => req.path === '/api/health',
  });

  // Keyed by IP only: these run before anyone is logged in
  const auth = rateLimit({
    windowMs: 60 * 1000,
    max: config.rateLimits.auth,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req: Request) => req.ip || 'unknown',
    validate: false,
    handler: (req: Request, res: Response) => {
      logger.warn(`[RateLimit] Auth limit exceeded for ${req.ip || 'unknown'} on ${req.path}`);
      res.status(429).json({ error: 'Too many login attempts. Please try again later.' });
    },
  });

  const booking = rateLimit({
    windowMs: 60 * 1000,
    max: config.rateLimits.booking,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: getClientKey,
    validate: false,
    handler: (req: Request, res: Response) => {
      logger.warn(`[RateLimit] Booking limit exceeded for ${getClientKey(req)} on ${req.path}`);
      res.status(429).json({ error: 'Too many booking attempts. Please wait a moment.' });
    },
  });

  return { global, auth, booking };
}
