import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../server/core/config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.env).toBe('development');
    expect(config.isProduction).toBe(false);
    expect(config.port).toBe(3001);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.dbPoolMax).toBe(20);
    expect(config.bcryptRounds).toBe(10);
    expect(config.sessionTtlMs).toBe(7 * 24 * 60 * 60 * 1000);
    expect(config.corsOrigins).toBe('*');
    expect(config.rateLimits).toEqual({ global: 600, auth: 20, booking: 30 });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ PORT: '8080', BCRYPT_ROUNDS: '4', SESSION_TTL_DAYS: '1' });
    expect(config.port).toBe(8080);
    expect(config.bcryptRounds).toBe(4);
    expect(config.sessionTtlMs).toBe(86_400_000);
  });

  it('should split CORS origins', () => {
    const config = loadConfig({ CORS_ORIGINS: 'https://a.example.com, https://b.example.com' });
    expect(config.corsOrigins).toEqual(['https://a.example.com', 'https://b.example.com']);
  });

  it('should require a session secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(ConfigError);
    const config = loadConfig({ NODE_ENV: 'production', SESSION_SECRET: 'test-secret-value' });
    expect(config.isProduction).toBe(true);
    expect(config.sessionSecret).toBe('test-secret-value');
  });

  it('should list every invalid variable', () => {
    const error = (() => {
      try {
        loadConfig({ PORT: 'abc', BCRYPT_ROUNDS: '3' });
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0].startsWith('PORT:')).toBe(true);
    expect(error.issues[1].startsWith('BCRYPT_ROUNDS:')).toBe(true);
  });

  it('should reject a malformed database URL', () => {
    expect(() => loadConfig({ DATABASE_URL: 'not a url' })).toThrow(ConfigError);
    expect(loadConfig({ DATABASE_URL: 'postgres://studio:pw@localhost:5432/studio' }).databaseUrl)
      .toBe('postgres://studio:pw@localhost:5432/studio');
  });
});
