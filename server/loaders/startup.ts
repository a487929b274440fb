import { sql } from 'drizzle-orm';
import type { Database } from '../db';
import { ensureDatabaseSchema } from '../db-init';
import { getErrorMessage } from '../utils/errorUtils';
import { logger } from '../core/logger';

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  label: string,
  maxRetries = 3,
  baseDelayMs = 1000
): Promise<T> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt === maxRetries) throw err;
      const delay = Math.pow(2, attempt) * baseDelayMs;
      logger.info(`[Startup] ${label} failed (attempt ${attempt}/${maxRetries}), retrying in ${delay}ms...`, {
        extra: { error: getErrorMessage(err) }
      });
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
  throw new Error('unreachable');
}

export interface StartupHealth {
  database: 'ok' | 'failed' | 'pending';
  criticalFailures: string[];
  startedAt: string;
  completedAt?: string;
}

const startupHealth: StartupHealth = {
  database: 'pending',
  criticalFailures: [],
  startedAt: new Date().toISOString()
};

export function getStartupHealth(): StartupHealth {
  return { ...startupHealth, criticalFailures: [...startupHealth.criticalFailures] };
}

/**
 * Connects and prepares the schema. The server refuses to start when the
 * database stays unreachable.
 */
export async function runStartupTasks(db: Database, options: { baseDelayMs?: number } = {}): Promise<void> {
  logger.info('[Startup] Running database initialization...');

  try {
    await retryWithBackoff(() => db.execute(sql`SELECT 1`), 'Database connection', 3, options.baseDelayMs);
    await ensureDatabaseSchema(db);
    startupHealth.database = 'ok';
  } catch (err: unknown) {
    logger.error('[Startup] Database initialization failed', { error: err instanceof Error ? err : new Error(String(err)) });
    startupHealth.database = 'failed';
    startupHealth.criticalFailures.push(`Database: ${getErrorMessage(err)}`);
    throw err;
  } finally {
    startupHealth.completedAt = new Date().toISOString();
  }

  logger.info('[Startup] Initialization complete');
}
