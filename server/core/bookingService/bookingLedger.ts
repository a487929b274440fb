import { and, asc, eq } from 'drizzle-orm';
import type { Database } from '../../db';
import { bookings, fitnessClasses, type Booking, type FitnessClass } from '../../../shared/schema';
import { ClassAlreadyStartedError, ClassNotFoundError, DuplicateBookingError } from '../errors';
import { isConstraintError } from '../db';
import { isPastInStudioTime, normalizeToStudioTime } from '../../utils/dateUtils';
import { toClassResponse, type ClassResponse } from '../classService';
import type { SessionUser } from '../../types/session';
import { reserveSlot } from './capacityLedger';
import { logger } from '../logger';
import { isSerialId } from '../../utils/validation';

export interface BookClassInput {
  classId: number;
  clientName: string;
  clientEmail: string;
}

export interface BookingWithClass extends Booking {
  fitnessClass: FitnessClass;
}

export interface BookingResponse {
  id: number;
  class_id: number;
  client_name: string;
  client_email: string;
  created_at: string;
  fitness_class?: ClassResponse;
}

export function toBookingResponse(booking: Booking | BookingWithClass): BookingResponse {
  return {
    id: booking.id,
    class_id: booking.classId,
    client_name: booking.clientName,
    client_email: booking.clientEmail,
    created_at: booking.createdAt.toISOString(),
    fitness_class: 'fitnessClass' in booking ? toClassResponse(booking.fitnessClass) : undefined,
  };
}

/**
 * Book one slot of a class for the authenticated user.
 *
 * Runs in a single transaction: the class lookup, the slot reservation and
 * the booking insert either all commit or none do, so a failed booking never
 * leaves the slot count decremented.
 */
export async function bookClass(
  db: Database,
  user: SessionUser,
  input: BookClassInput,
  now: Date = new Date()
): Promise<BookingWithClass> {
  // ids past the column's range cannot exist
  if (!isSerialId(input.classId)) {
    throw new ClassNotFoundError(input.classId);
  }

  try {
    const result = await db.transaction(async (tx) => {
      const [cls] = await tx.select()
        .from(fitnessClasses)
        .where(eq(fitnessClasses.id, input.classId))
        .limit(1);

      if (!cls) {
        throw new ClassNotFoundError(input.classId);
      }

      if (isPastInStudioTime(normalizeToStudioTime(cls.startsAt), now)) {
        throw new ClassAlreadyStartedError(cls.id);
      }

      const reserved = await reserveSlot(tx, cls.id);

      const [existing] = await tx.select({ id: bookings.id })
        .from(bookings)
        .where(and(
          eq(bookings.userId, user.id),
          eq(bookings.classId, cls.id)
        ))
        .limit(1);

      if (existing) {
        throw new DuplicateBookingError(cls.id);
      }

      const [booking] = await tx.insert(bookings)
        .values({
          userId: user.id,
          classId: cls.id,
          clientName: input.clientName,
          clientEmail: input.clientEmail,
        })
        .returning();

      return { ...booking, fitnessClass: reserved };
    });

    logger.info('[Bookings] Slot reserved', {
      bookingId: result.id,
      classId: result.classId,
      userId: user.id,
      availableSlots: result.fitnessClass.availableSlots,
    });

    return result;
  } catch (error: unknown) {
    // two requests from the same account raced past the duplicate check
    if (isConstraintError(error).type === 'unique') {
      throw new DuplicateBookingError(input.classId);
    }
    throw error;
  }
}

/**
 * Bookings placed by `user`, oldest first.
 */
export async function listBookingsForUser(db: Database, user: SessionUser): Promise<BookingWithClass[]> {
  const rows = await db.select({ booking: bookings, fitnessClass: fitnessClasses })
    .from(bookings)
    .innerJoin(fitnessClasses, eq(bookings.classId, fitnessClasses.id))
    .where(eq(bookings.userId, user.id))
    .orderBy(asc(bookings.createdAt), asc(bookings.id));

  return rows.map(row => ({ ...row.booking, fitnessClass: row.fitnessClass }));
}
