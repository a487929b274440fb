import { z } from 'zod';

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_URL: z.string().url().optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(200).default(20),
  SESSION_SECRET: z.string().min(8).optional(),
  SESSION_TTL_DAYS: z.coerce.number().int().min(1).max(90).default(7),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  CORS_ORIGINS: z.string().default('*'),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(600),
  AUTH_RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(20),
  BOOKING_RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(30),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  isProduction: boolean;
  port: number;
  databaseUrl?: string;
  dbPoolMax: number;
  sessionSecret: string;
  sessionTtlMs: number;
  bcryptRounds: number;
  corsOrigins: string[] | '*';
  rateLimits: {
    global: number;
    auth: number;
    booking: number;
  };
}

const DEV_SESSION_SECRET = 'dev-only-session-secret';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const values = parsed.data;
  const isProduction = values.NODE_ENV === 'production';

  if (isProduction && !values.SESSION_SECRET) {
    throw new ConfigError(['SESSION_SECRET: required in production']);
  }

  const origins = values.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean);

  return {
    env: values.NODE_ENV,
    isProduction,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    dbPoolMax: values.DB_POOL_MAX,
    sessionSecret: values.SESSION_SECRET ?? DEV_SESSION_SECRET,
    sessionTtlMs: values.SESSION_TTL_DAYS * 24 * 60 * 60 * 1000,
    bcryptRounds: values.BCRYPT_ROUNDS,
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
    rateLimits: {
      global: values.RATE_LIMIT_MAX,
      auth: values.AUTH_RATE_LIMIT_MAX,
      booking: values.BOOKING_RATE_LIMIT_MAX,
    },
  };
}
