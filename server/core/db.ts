import { Pool } from 'pg';
import type { AppConfig } from './config';
import { getDatabaseErrorCode, getErrorDetail, getErrorProperty, safeErrorDetail } from '../utils/errorUtils';
import { logger } from './logger';

export function createPool(config: AppConfig): Pool {
  if (!config.databaseUrl) {
    throw new Error('[Database] DATABASE_URL is required');
  }

  const pool = new Pool({
    connectionString: config.databaseUrl,
    connectionTimeoutMillis: 10000,
    idleTimeoutMillis: 30000,
    max: config.dbPoolMax,
    ssl: config.isProduction ? { rejectUnauthorized: false } : undefined,
  });

  pool.on('error', (err) => {
    logger.error('[Database] Pool error:', { extra: { detail: safeErrorDetail(err) } });
  });

  pool.on('connect', () => {
    logger.info('[Database] New client connected');
  });

  return pool;
}

export interface ConstraintViolation {
  type: 'unique' | 'foreign_key' | 'check' | null;
  constraint?: string;
  detail?: string;
}

export function isConstraintError(error: unknown): ConstraintViolation {
  const code = getDatabaseErrorCode(error);
  const source = getErrorProperty(error, 'constraint') === undefined ? getErrorProperty(error, 'cause') ?? error : error;
  const rawConstraint = getErrorProperty(source, 'constraint');
  const constraint = typeof rawConstraint === 'string' ? rawConstraint : undefined;
  const detail = getErrorDetail(source);
  if (code === '23505') return { type: 'unique', constraint, detail };
  if (code === '23503') return { type: 'foreign_key', constraint, detail };
  if (code === '23514') return { type: 'check', constraint, detail };
  return { type: null };
}

export function getPoolStatus(pool: Pool) {
  return {
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount
  };
}
