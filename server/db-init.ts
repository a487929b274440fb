import { sql } from 'drizzle-orm';
import type { Database } from './db';
import { logger } from './core/logger';

// Mirrors shared/models. Each entry is a single statement so it can run over
// the extended query protocol.
const SCHEMA_STATEMENTS: string[] = [
  `CREATE TABLE IF NOT EXISTS users (
    id SERIAL PRIMARY KEY,
    name VARCHAR(100) NOT NULL,
    email VARCHAR(255) NOT NULL UNIQUE,
    password_hash VARCHAR(255) NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS classes (
    id SERIAL PRIMARY KEY,
    name VARCHAR(150) NOT NULL,
    instructor VARCHAR(100) NOT NULL,
    date_time TIMESTAMPTZ NOT NULL,
    total_slots INTEGER NOT NULL,
    available_slots INTEGER NOT NULL,
    created_by INTEGER REFERENCES users(id) ON DELETE SET NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT classes_total_slots_positive CHECK (total_slots > 0),
    CONSTRAINT classes_available_slots_range CHECK (available_slots >= 0 AND available_slots <= total_slots)
  )`,
  `CREATE INDEX IF NOT EXISTS classes_date_time_idx ON classes (date_time)`,
  `CREATE TABLE IF NOT EXISTS bookings (
    id SERIAL PRIMARY KEY,
    user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    class_id INTEGER NOT NULL REFERENCES classes(id) ON DELETE CASCADE,
    client_name VARCHAR(100) NOT NULL,
    client_email VARCHAR(255) NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS bookings_user_id_idx ON bookings (user_id)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS uq_booking_user_class ON bookings (user_id, class_id)`,
];

export async function ensureDatabaseSchema(db: Database): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
  logger.info('[DB Init] Schema ready', { extra: { statements: SCHEMA_STATEMENTS.length } });
}
