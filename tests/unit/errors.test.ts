import { describe, it, expect } from 'vitest';
import {
  BookingDomainError,
  ClassNotFoundError,
  DuplicateBookingError,
  PastScheduleError,
  SlotsExhaustedError,
  isBookingDomainError,
} from '../../server/core/errors';
import { isConstraintError } from '../../server/core/db';
import { safeErrorDetail } from '../../server/utils/errorUtils';

describe('Domain errors', () => {
  it.each([
    [new PastScheduleError('2000-01-01T09:00:00+05:30'), 'PAST_SCHEDULE', 400],
    [new SlotsExhaustedError(7), 'SLOTS_EXHAUSTED', 409],
    [new ClassNotFoundError(7), 'CLASS_NOT_FOUND', 404],
    [new DuplicateBookingError(7), 'DUPLICATE_BOOKING', 409],
  ])('%s carries code and status', (error, code, statusCode) => {
    expect(error).toBeInstanceOf(BookingDomainError);
    expect(error.code).toBe(code);
    expect(error.statusCode).toBe(statusCode);
    expect(isBookingDomainError(error)).toBe(true);
  });

  it('should name errors after their class', () => {
    expect(new SlotsExhaustedError(1).name).toBe('SlotsExhaustedError');
  });

  it('should not treat plain errors as domain errors', () => {
    expect(isBookingDomainError(new Error('boom'))).toBe(false);
  });
});

describe('isConstraintError', () => {
  it('should recognise unique violations', () => {
    expect(isConstraintError({ code: '23505', constraint: 'uq_booking_user_class' })).toEqual({
      type: 'unique',
      constraint: 'uq_booking_user_class',
      detail: undefined,
    });
  });

  it('should look through a wrapping error', () => {
    const wrapped = { message: 'Failed query', cause: { code: '23514', constraint: 'classes_available_slots_range' } };
    expect(isConstraintError(wrapped)).toEqual({
      type: 'check',
      constraint: 'classes_available_slots_range',
      detail: undefined,
    });
  });

  it('should ignore other errors', () => {
    expect(isConstraintError(new Error('timeout'))).toEqual({ type: null });
  });
});

describe('safeErrorDetail', () => {
  it('should redact connection strings', () => {
    expect(safeErrorDetail(new Error('connect failed postgres://studio:pw@db:5432/app')))
      .toBe('connect failed [REDACTED]');
  });
});
