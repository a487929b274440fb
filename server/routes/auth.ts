import { Router } from 'express';
import type { RequestHandler } from 'express';
import type { Database } from '../db';
import type { AppConfig } from '../core/config';
import { loginSchema, signupSchema } from '../../shared/schema';
import { authenticateUser, registerUser, toPublicUser, toSessionUser } from '../core/userService';
import { isAuthenticated } from '../core/middleware';
import { logAndRespond, logger, respondWithError } from '../core/logger';
import { getSessionUser } from '../types/session';
import { respondWithValidationError } from '../utils/validation';

export interface AuthRouterDeps {
  db: Database;
  config: AppConfig;
  authLimiter: RequestHandler;
}

export function createAuthRouter({ db, config, authLimiter }: AuthRouterDeps): Router {
  const router = Router();

  router.post('/api/auth/signup', authLimiter, async (req, res) => {
    const parseResult = signupSchema.safeParse(req.body);
    if (!parseResult.success) {
      return respondWithValidationError(req, res, parseResult.error);
    }

    try {
      const user = await registerUser(db, parseResult.data, { bcryptRounds: config.bcryptRounds });
      res.status(201).json(toPublicUser(user));
    } catch (error: unknown) {
      respondWithError(req, res, error, 'Signup failed. Please try again.');
    }
  });

  router.post('/api/auth/login', authLimiter, async (req, res) => {
    const parseResult = loginSchema.safeParse(req.body);
    if (!parseResult.success) {
      return respondWithValidationError(req, res, parseResult.error);
    }

    try {
      const user = await authenticateUser(db, parseResult.data.email, parseResult.data.password);

      // fresh session id on privilege change
      req.session.regenerate((regenerateErr) => {
        if (regenerateErr) {
          return logAndRespond(req, res, 500, 'Failed to create session', regenerateErr);
        }
        req.session.user = toSessionUser(user);
        req.session.save((saveErr) => {
          if (saveErr) {
            return logAndRespond(req, res, 500, 'Failed to create session', saveErr);
          }
          logger.info('[Auth] Login', { requestId: req.requestId, userId: user.id });
          res.json({ success: true, user: toPublicUser(user) });
        });
      });
    } catch (error: unknown) {
      respondWithError(req, res, error, 'Login failed. Please try again.');
    }
  });

  router.post('/api/auth/logout', (req, res) => {
    req.session.destroy((err) => {
      if (err) {
        return logAndRespond(req, res, 500, 'Failed to log out', err);
      }
      res.clearCookie('sid');
      res.json({ success: true });
    });
  });

  router.get('/api/auth/session', isAuthenticated, (req, res) => {
    res.json({ user: getSessionUser(req) });
  });

  return router;
}
