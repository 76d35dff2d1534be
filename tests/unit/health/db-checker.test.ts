import { describe, expect, it } from 'vitest';

import { makeDbHealthChecker } from '@/modules/health/index.js';

import { makeRecordingDb } from '../../fixtures/fakes.js';

describe('makeDbHealthChecker', () => {
  it('is healthy when SELECT 1 succeeds', async () => {
    const { db, queries } = makeRecordingDb<unknown>();
    const checker = makeDbHealthChecker(db, { name: 'database' });

    const result = await checker();

    expect(result).toMatchObject({ name: 'database', status: 'healthy', critical: true });
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(queries.map((q) => q.sql)).toEqual(['SELECT 1']);
  });

  it('is unhealthy when the query fails', async () => {
    const { db } = makeRecordingDb<unknown>({ failWithError: new Error('ECONNREFUSED') });
    const checker = makeDbHealthChecker(db, { name: 'database' });

    const result = await checker();

    expect(result).toMatchObject({
      name: 'database',
      status: 'unhealthy',
      message: 'ECONNREFUSED',
      critical: true,
    });
  });

  it('is unhealthy when the query times out', async () => {
    const { db } = makeRecordingDb<unknown>({ delayMs: 200 });
    const checker = makeDbHealthChecker(db, { name: 'database', timeoutMs: 10 });

    const result = await checker();

    expect(result.status).toBe('unhealthy');
    expect(result.message).toBe('Database health check timed out after 10ms');
  });
});
