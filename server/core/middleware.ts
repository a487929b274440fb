import type { RequestHandler } from 'express';
import { getSessionUser } from '../types/session';
import { createErrorResponse } from './logger';

export const isAuthenticated: RequestHandler = (req, res, next) => {
  const user = getSessionUser(req);

  if (!user) {
    res.status(401).json(createErrorResponse(req, 'Not authenticated', 'UNAUTHENTICATED'));
    return;
  }

  next();
};
