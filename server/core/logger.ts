import type { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { getSessionUser } from '../types/session';
import { isBookingDomainError } from './errors';
import { getDatabaseErrorCode, getErrorDetail, getErrorProperty } from '../utils/errorUtils';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function generateRequestId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  req.requestId = generateRequestId();
  res.setHeader('X-Request-Id', req.requestId);
  next();
}

export interface LogContext {
  requestId?: string;
  method?: string;
  path?: string;
  userId?: number;
  params?: Record<string, unknown>;
  query?: Record<string, unknown>;
  duration?: number;
  statusCode?: number;
  error?: Error | string;
  stack?: string;
  extra?: Record<string, unknown>;
  classId?: number;
  bookingId?: number;
  availableSlots?: number;
  dbErrorCode?: string;
  dbErrorDetail?: string;
  dbErrorConstraint?: string;
  [key: string]: unknown;
}

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'authorization', 'cookie', 'apikey', 'api_key'];

function formatTimestamp(): string {
  return new Date().toISOString();
}

export function sanitize(obj: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!obj) return undefined;
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.some(sk => key.toLowerCase().includes(sk))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

function buildEntry(level: 'INFO' | 'WARN' | 'ERROR', message: string, context?: LogContext) {
  return {
    level,
    timestamp: formatTimestamp(),
    message,
    ...context,
    params: sanitize(context?.params),
    query: sanitize(context?.query),
    extra: sanitize(context?.extra),
  };
}

export const logger = {
  info(message: string, context?: LogContext) {
    console.log(JSON.stringify(buildEntry('INFO', message, context)));
  },

  warn(message: string, context?: LogContext) {
    console.warn(JSON.stringify(buildEntry('WARN', message, context)));
  },

  error(message: string, context?: LogContext) {
    const errorMsg = context?.error instanceof Error
      ? context.error.message
      : context?.error;
    const stack = context?.error instanceof Error
      ? context.error.stack
      : context?.stack;

    console.error(JSON.stringify({
      ...buildEntry('ERROR', message, context),
      error: errorMsg,
      stack,
    }));
  },
};

export function logRequest(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const context: LogContext = {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration,
      userId: getSessionUser(req)?.id,
    };
    const message = `${req.method} ${req.path}`;

    if (res.statusCode >= 400) {
      logger.warn(message, context);
    } else {
      logger.info(message, context);
    }
  });

  next();
}

export interface ApiErrorResponse {
  error: string;
  code?: string;
  requestId?: string;
}

export function createErrorResponse(
  req: Request,
  message: string,
  code?: string
): ApiErrorResponse {
  return {
    error: message,
    code,
    requestId: req.requestId,
  };
}

export function logAndRespond(
  req: Request,
  res: Response,
  statusCode: number,
  message: string,
  error?: unknown,
  code?: string
) {
  const err = error instanceof Error ? error : new Error(String(error));
  const dbErrorConstraint = getErrorProperty(error, 'constraint');

  logger.error(`[API Error] ${message}`, {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    params: req.params,
    error: err,
    dbErrorCode: getDatabaseErrorCode(error),
    dbErrorDetail: getErrorDetail(error),
    dbErrorConstraint: typeof dbErrorConstraint === 'string' ? dbErrorConstraint : undefined,
    userId: getSessionUser(req)?.id,
  });

  res.status(statusCode).json(createErrorResponse(req, message, code));
}

/**
 * Answer a route failure: domain errors map to their own status and code,
 * anything else is logged and reported as a 500 with `fallbackMessage`.
 */
export function respondWithError(req: Request, res: Response, error: unknown, fallbackMessage: string) {
  if (isBookingDomainError(error)) {
    res.status(error.statusCode).json(createErrorResponse(req, error.message, error.code));
    return;
  }
  logAndRespond(req, res, 500, fallbackMessage, error);
}
