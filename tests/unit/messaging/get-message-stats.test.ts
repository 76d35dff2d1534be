import { ok } from 'neverthrow';
import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import { createDatabaseError } from '@/modules/messaging/core/errors.js';
import { getMessageStats } from '@/modules/messaging/core/usecases/get-message-stats.js';

import { createTestMessageAttempt, makeFakeAttemptRepo } from '../../fixtures/fakes.js';

const logger = pinoLogger({ level: 'silent' });

describe('getMessageStats', () => {
  const attempts = [
    createTestMessageAttempt({ id: 'a1', groupId: 'g1', status: 'sent', providerMessageId: 'SM-1' }),
    createTestMessageAttempt({ id: 'a2', groupId: 'g1', status: 'read', providerMessageId: 'SM-2' }),
    createTestMessageAttempt({ id: 'a3', groupId: 'g1', status: 'failed', providerMessageId: '' }),
    createTestMessageAttempt({
      id: 'a4',
      groupId: 'g2',
      status: 'delivered',
      providerMessageId: 'SM-4',
    }),
    createTestMessageAttempt({
      id: 'a5',
      direction: 'inbound',
      status: 'delivered',
      providerMessageId: '',
    }),
  ];

  it('counts outbound attempts per status and inbound messages', async () => {
    const attemptRepo = makeFakeAttemptRepo({ attempts });

    const result = await getMessageStats({ attemptRepo, logger }, {});

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        total: 4,
        queued: 0,
        sent: 1,
        delivered: 1,
        read: 1,
        failed: 1,
        inbound: 1,
      });
    }
  });

  it('filters by group', async () => {
    const attemptRepo = makeFakeAttemptRepo({ attempts });

    const result = await getMessageStats({ attemptRepo, logger }, { groupId: 'g1' });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        total: 3,
        queued: 0,
        sent: 1,
        delivered: 0,
        read: 1,
        failed: 1,
        inbound: 0,
      });
    }
  });

  it('counts unknown stored statuses in the total only', async () => {
    const attemptRepo = {
      ...makeFakeAttemptRepo(),
      countByStatus: () =>
        Promise.resolve(
          ok([
            { direction: 'outbound' as const, status: 'sent', count: 2 },
            { direction: 'outbound' as const, status: 'legacy', count: 3 },
          ])
        ),
    };

    const result = await getMessageStats({ attemptRepo, logger }, {});

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.total).toBe(5);
      expect(result.value.sent).toBe(2);
    }
  });

  it('returns the database error', async () => {
    const attemptRepo = makeFakeAttemptRepo({ failCount: createDatabaseError('timeout') });

    const result = await getMessageStats({ attemptRepo, logger }, {});

    expect(result.isErr()).toBe(true);
  });
});
