import type { Express } from 'express';
import type { Database } from '../db';
import type { AppConfig } from '../core/config';
import type { RateLimiters } from '../middleware/rateLimiting';
import { createAuthRouter } from '../routes/auth';
import { createClassesRouter } from '../routes/classes';
import { createBookingsRouter } from '../routes/bookings';

export interface RouteDeps {
  db: Database;
  config: AppConfig;
  limiters: RateLimiters;
}

export function registerRoutes(app: Express, { db, config, limiters }: RouteDeps): void {
  app.use(createAuthRouter({ db, config, authLimiter: limiters.auth }));
  app.use(createClassesRouter({ db }));
  app.use(createBookingsRouter({ db, bookingLimiter: limiters.booking }));
}
