import bcrypt from 'bcryptjs';
import { eq } from 'drizzle-orm';
import type { Database } from '../db';
import { users, type User, type SignupInput } from '../../shared/schema';
import { EmailAlreadyRegisteredError, InvalidCredentialsError } from './errors';
import { isConstraintError } from './db';
import type { SessionUser } from '../types/session';
import { logger } from './logger';

/**
 * Normalize email address for consistent matching:
 * lowercase, trimmed, internal whitespace removed.
 */
export function normalizeEmail(email: string | undefined | null): string {
  if (!email) return '';
  return email.toLowerCase().trim().replace(/\s+/g, '');
}

export interface PublicUser {
  id: number;
  name: string;
  email: string;
  created_at: string;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    created_at: user.createdAt.toISOString(),
  };
}

export function toSessionUser(user: User): SessionUser {
  return { id: user.id, email: user.email, name: user.name };
}

export async function findUserByEmail(db: Database, email: string): Promise<User | undefined> {
  const [user] = await db.select().from(users).where(eq(users.email, normalizeEmail(email))).limit(1);
  return user;
}

export async function registerUser(
  db: Database,
  input: SignupInput,
  options: { bcryptRounds: number }
): Promise<User> {
  const email = normalizeEmail(input.email);

  if (await findUserByEmail(db, email)) {
    throw new EmailAlreadyRegisteredError();
  }

  const passwordHash = await bcrypt.hash(input.password, options.bcryptRounds);

  try {
    const [user] = await db.insert(users)
      .values({ name: input.name, email, passwordHash })
      .returning();
    logger.info('[Auth] User registered', { userId: user.id });
    return user;
  } catch (error: unknown) {
    // a concurrent signup with the same email won the insert
    if (isConstraintError(error).type === 'unique') {
      throw new EmailAlreadyRegisteredError();
    }
    throw error;
  }
}

export async function authenticateUser(db: Database, email: string, password: string): Promise<User> {
  const user = await findUserByEmail(db, email);
  if (!user) {
    throw new InvalidCredentialsError();
  }

  const isValid = await bcrypt.compare(password, user.passwordHash);
  if (!isValid) {
    throw new InvalidCredentialsError();
  }

  return user;
}
