import { Router } from 'express';
import type { Database } from '../db';
import { createClassSchema } from '../../shared/schema';
import { createClass, getClassById, listClasses, toClassResponse } from '../core/classService';
import { isAuthenticated } from '../core/middleware';
import { createErrorResponse, respondWithError } from '../core/logger';
import { getSessionUser } from '../types/session';
import { parseIdParam, respondWithValidationError } from '../utils/validation';

export function createClassesRouter({ db }: { db: Database }): Router {
  const router = Router();

  router.post('/api/classes', isAuthenticated, async (req, res) => {
    const user = getSessionUser(req);
    if (!user) {
      return res.status(401).json(createErrorResponse(req, 'Not authenticated', 'UNAUTHENTICATED'));
    }

    const parseResult = createClassSchema.safeParse(req.body);
    if (!parseResult.success) {
      return respondWithValidationError(req, res, parseResult.error);
    }

    const { name, dateTime, instructor, availableSlots } = parseResult.data;

    try {
      const created = await createClass(db, user, {
        name,
        instructor,
        startTime: dateTime,
        totalSlots: availableSlots,
      });
      res.status(201).json(toClassResponse(created));
    } catch (error: unknown) {
      respondWithError(req, res, error, 'Failed to create class');
    }
  });

  // Upcoming classes by default; ?include_past=true lists everything
  router.get('/api/classes', async (req, res) => {
    const includePast = req.query.include_past === 'true';
    try {
      const classes = await listClasses(db, includePast ? {} : { from: new Date() });
      res.json(classes.map(toClassResponse));
    } catch (error: unknown) {
      respondWithError(req, res, error, 'Failed to fetch classes');
    }
  });

  router.get('/api/classes/:id', async (req, res) => {
    const classId = parseIdParam(req.params.id);
    if (classId === null) {
      return res.status(400).json(createErrorResponse(req, 'Invalid class id', 'VALIDATION_ERROR'));
    }

    try {
      const cls = await getClassById(db, classId);
      res.json(toClassResponse(cls));
    } catch (error: unknown) {
      respondWithError(req, res, error, 'Failed to fetch class');
    }
  });

  return router;
}
