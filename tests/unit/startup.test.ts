import { describe, it, expect, vi } from 'vitest';
import { getStartupHealth, retryWithBackoff, runStartupTasks } from '../../server/loaders/startup';
import { createTestDatabase } from '../helpers/testDb';

describe('retryWithBackoff', () => {
  it('should retry until the operation succeeds', async () => {
    const operation = vi.fn()
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValueOnce('connected');

    await expect(retryWithBackoff(operation, 'Database connection', 3, 1)).resolves.toBe('connected');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should give up after the last attempt', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(retryWithBackoff(operation, 'Database connection', 2, 1)).rejects.toThrow('ECONNREFUSED');
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe('runStartupTasks', () => {
  it('should prepare the schema and report healthy', async () => {
    const testDb = await createTestDatabase();
    try {
      await runStartupTasks(testDb.db, { baseDelayMs: 1 });
      const health = getStartupHealth();
      expect(health.database).toBe('ok');
      expect(health.criticalFailures).toEqual([]);
      expect(health.completedAt).toBeDefined();
    } finally {
      await testDb.close();
    }
  });
});
