import { and, eq, gt, sql } from 'drizzle-orm';
import type { Database, Transaction } from '../../db';
import { fitnessClasses, type FitnessClass } from '../../../shared/schema';
import { SlotsExhaustedError } from '../errors';

/**
 * The reservation statement: decrement by one, guarded on a slot remaining.
 */
export function buildReserveSlotQuery(db: Database, classId: number) {
  return db.update(fitnessClasses)
    .set({
      availableSlots: sql`${fitnessClasses.availableSlots} - 1`,
      updatedAt: sql`NOW()`,
    })
    .where(and(
      eq(fitnessClasses.id, classId),
      gt(fitnessClasses.availableSlots, 0)
    ))
    .returning();
}

/**
 * Take one slot from a class inside the caller's transaction.
 *
 * The check and the decrement are a single conditional UPDATE, so two
 * callers racing for the last slot cannot both succeed: the second one's
 * predicate no longer matches once the first has committed. Returns the
 * class row as it stands after the decrement.
 */
export async function reserveSlot(tx: Transaction, classId: number): Promise<FitnessClass> {
  const [reserved] = await buildReserveSlotQuery(tx, classId);

  if (!reserved) {
    throw new SlotsExhaustedError(classId);
  }

  return reserved;
}
