import { Router } from 'express';
import type { RequestHandler } from 'express';
import type { Database } from '../db';
import { createBookingSchema } from '../../shared/schema';
import { bookClass, listBookingsForUser, toBookingResponse } from '../core/bookingService';
import { isAuthenticated } from '../core/middleware';
import { createErrorResponse, respondWithError } from '../core/logger';
import { getSessionUser } from '../types/session';
import { respondWithValidationError } from '../utils/validation';

export interface BookingsRouterDeps {
  db: Database;
  bookingLimiter: RequestHandler;
}

export function createBookingsRouter({ db, bookingLimiter }: BookingsRouterDeps): Router {
  const router = Router();

  router.post('/api/book', isAuthenticated, bookingLimiter, async (req, res) => {
    const user = getSessionUser(req);
    if (!user) {
      return res.status(401).json(createErrorResponse(req, 'Not authenticated', 'UNAUTHENTICATED'));
    }

    const parseResult = createBookingSchema.safeParse(req.body);
    if (!parseResult.success) {
      return respondWithValidationError(req, res, parseResult.error);
    }

    try {
      const booking = await bookClass(db, user, {
        classId: parseResult.data.class_id,
        clientName: parseResult.data.client_name,
        clientEmail: parseResult.data.client_email,
      });
      res.status(201).json(toBookingResponse(booking));
    } catch (error: unknown) {
      respondWithError(req, res, error, 'Failed to book class');
    }
  });

  router.get('/api/bookings', isAuthenticated, async (req, res) => {
    const user = getSessionUser(req);
    if (!user) {
      return res.status(401).json(createErrorResponse(req, 'Not authenticated', 'UNAUTHENTICATED'));
    }

    try {
      const items = await listBookingsForUser(db, user);
      res.json(items.map(toBookingResponse));
    } catch (error: unknown) {
      respondWithError(req, res, error, 'Failed to fetch bookings');
    }
  });

  return router;
}
