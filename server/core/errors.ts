/**
 * Domain failures raised by the class registry, the booking ledger and the
 * account service. Each carries a stable `code` and the HTTP status the API
 * answers with; none of them is fatal to the process.
 */
export class BookingDomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTimestampError extends BookingDomainError {
  constructor(public readonly input: unknown) {
    super(`Invalid timestamp: ${String(input)}`, 'INVALID_TIMESTAMP', 400);
  }
}

export class PastScheduleError extends BookingDomainError {
  constructor(public readonly startsAt: string) {
    super('Class time cannot be in the past', 'PAST_SCHEDULE', 400);
  }
}

export class InvalidCapacityError extends BookingDomainError {
  constructor(public readonly totalSlots: number) {
    super('Total slots must be a positive integer', 'INVALID_CAPACITY', 400);
  }
}

export class SlotsExhaustedError extends BookingDomainError {
  constructor(public readonly classId: number) {
    super('No available slots', 'SLOTS_EXHAUSTED', 409);
  }
}

export class ClassNotFoundError extends BookingDomainError {
  constructor(public readonly classId: number) {
    super('Class not found', 'CLASS_NOT_FOUND', 404);
  }
}

export class ClassAlreadyStartedError extends BookingDomainError {
  constructor(public readonly classId: number) {
    super('Cannot book a past class', 'CLASS_ALREADY_STARTED', 400);
  }
}

export class DuplicateBookingError extends BookingDomainError {
  constructor(public readonly classId: number) {
    super('Already booked for this class', 'DUPLICATE_BOOKING', 409);
  }
}

export class EmailAlreadyRegisteredError extends BookingDomainError {
  constructor() {
    super('Email already registered', 'EMAIL_ALREADY_REGISTERED', 409);
  }
}

export class InvalidCredentialsError extends BookingDomainError {
  constructor() {
    super('Invalid email or password', 'INVALID_CREDENTIALS', 401);
  }
}

export function isBookingDomainError(error: unknown): error is BookingDomainError {
  return error instanceof BookingDomainError;
}
