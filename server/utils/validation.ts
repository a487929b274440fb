import type { Request, Response } from 'express';
import type { ZodError } from 'zod';
import { createErrorResponse } from '../core/logger';

export function formatZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}

export function respondWithValidationError(req: Request, res: Response, error: ZodError) {
  res.status(400).json(createErrorResponse(req, formatZodError(error), 'VALIDATION_ERROR'));
}

export function parseIdParam(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const id = parseInt(value, 10);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

/** Upper bound of a Postgres `serial` column. */
const MAX_SERIAL_ID = 2_147_483_647;

export function isSerialId(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= MAX_SERIAL_ID;
}
