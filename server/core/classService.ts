import { asc, eq, gt } from 'drizzle-orm';
import type { Database } from '../db';
import { fitnessClasses, type FitnessClass } from '../../shared/schema';
import { ClassNotFoundError, InvalidCapacityError, PastScheduleError } from './errors';
import { formatStudioISOString, isPastInStudioTime, normalizeToStudioTime } from '../utils/dateUtils';
import type { SessionUser } from '../types/session';
import { isSerialId } from '../utils/validation';
import { logger } from './logger';

export interface CreateClassInput {
  name: string;
  instructor: string;
  startTime: string | Date;
  totalSlots: number;
}

export interface ClassResponse {
  id: number;
  name: string;
  dateTime: string;
  instructor: string;
  availableSlots: number;
  totalSlots: number;
}

export function toClassResponse(cls: FitnessClass): ClassResponse {
  return {
    id: cls.id,
    name: cls.name,
    dateTime: formatStudioISOString(cls.startsAt),
    instructor: cls.instructor,
    availableSlots: cls.availableSlots,
    totalSlots: cls.totalSlots,
  };
}

/**
 * Schedule a new class owned by `owner`. The start time is normalized to the
 * studio timezone and must lie strictly after `now`; the class opens with
 * every slot available.
 */
export async function createClass(
  db: Database,
  owner: SessionUser,
  input: CreateClassInput,
  now: Date = new Date()
): Promise<FitnessClass> {
  if (!Number.isInteger(input.totalSlots) || input.totalSlots <= 0) {
    throw new InvalidCapacityError(input.totalSlots);
  }

  const startsAt = normalizeToStudioTime(input.startTime);
  if (isPastInStudioTime(startsAt, now)) {
    throw new PastScheduleError(startsAt.local);
  }

  const [created] = await db.insert(fitnessClasses)
    .values({
      name: input.name,
      instructor: input.instructor,
      startsAt: startsAt.instant,
      totalSlots: input.totalSlots,
      availableSlots: input.totalSlots,
      createdBy: owner.id,
    })
    .returning();

  logger.info('[Classes] Class scheduled', {
    classId: created.id,
    userId: owner.id,
    extra: { startsAt: startsAt.local, totalSlots: created.totalSlots }
  });

  return created;
}

export interface ListClassesOptions {
  /** Only classes starting strictly after this instant. */
  from?: Date;
}

export async function listClasses(db: Database, options: ListClassesOptions = {}): Promise<FitnessClass[]> {
  return db.select()
    .from(fitnessClasses)
    .where(options.from ? gt(fitnessClasses.startsAt, options.from) : undefined)
    .orderBy(asc(fitnessClasses.startsAt), asc(fitnessClasses.id));
}

export async function getClassById(db: Database, classId: number): Promise<FitnessClass> {
  if (!isSerialId(classId)) {
    throw new ClassNotFoundError(classId);
  }
  const [cls] = await db.select().from(fitnessClasses).where(eq(fitnessClasses.id, classId)).limit(1);
  if (!cls) {
    throw new ClassNotFoundError(classId);
  }
  return cls;
}
