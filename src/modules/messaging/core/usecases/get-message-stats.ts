/**
 * Get Message Stats Use Case
 *
 * Counts outbound attempts per canonical status, plus inbound messages.
 */

import { ok, err, type Result } from 'neverthrow';

import { isCanonicalStatus } from '../status-mapping.js';

import type { DatabaseError } from '../errors.js';
import type { MessageAttemptRepository } from '../ports.js';
import type { MessageStats } from '../types.js';
import type { Logger } from 'pino';

export interface GetMessageStatsDeps {
  attemptRepo: MessageAttemptRepository;
  logger: Logger;
}

export interface GetMessageStatsInput {
  groupId?: string;
}

export const getMessageStats = async (
  deps: GetMessageStatsDeps,
  input: GetMessageStatsInput
): Promise<Result<MessageStats, DatabaseError>> => {
  const log = deps.logger.child({ usecase: 'getMessageStats' });

  const countResult = await deps.attemptRepo.countByStatus(
    input.groupId !== undefined ? { groupId: input.groupId } : {}
  );

  if (countResult.isErr()) {
    log.error({ error: countResult.error }, 'Failed to count message attempts');
    return err(countResult.error);
  }

  const stats: MessageStats = {
    total: 0,
    queued: 0,
    sent: 0,
    delivered: 0,
    read: 0,
    failed: 0,
    inbound: 0,
  };

  for (const row of countResult.value) {
    if (row.direction === 'inbound') {
      stats.inbound += row.count;
      continue;
    }
    stats.total += row.count;
    if (isCanonicalStatus(row.status)) {
      stats[row.status] += row.count;
    } else {
      log.warn({ status: row.status, count: row.count }, 'Stored attempts with unknown status');
    }
  }

  return ok(stats);
};
