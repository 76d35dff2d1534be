/**
 * Reconcile Status Use Case
 *
 * Applies a provider status callback to the attempt stored under the same
 * provider message id.
 */

import { ok, err, type Result } from 'neverthrow';

import { createUnrecognizedCallback, type DatabaseError } from '../errors.js';
import { forwardPredecessors, normalizeStatus } from '../status-mapping.js';

import type { MessageAttemptRepository, UpdateStatusOptions } from '../ports.js';
import type { ReconcileOutcome, ReconciliationPolicy, StatusCallback } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ReconcileStatusDeps {
  attemptRepo: MessageAttemptRepository;
  policy: ReconciliationPolicy;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reconciles one status callback.
 *
 * Unrecognized statuses and unknown message ids are reported as `ignored`
 * and write nothing. Under `last_write_wins` the stored status is
 * overwritten whatever it was; under `forward_only` a callback reporting an
 * earlier stage is reported as `stale`. Repeating a callback is a no-op.
 */
export const reconcileStatus = async (
  deps: ReconcileStatusDeps,
  callback: StatusCallback
): Promise<Result<ReconcileOutcome, DatabaseError>> => {
  const { attemptRepo, policy, logger } = deps;
  const { providerMessageId, rawStatus } = callback;

  const log = logger.child({
    usecase: 'reconcileStatus',
    provider: callback.provider,
    providerMessageId,
  });

  const status = normalizeStatus(callback.provider, rawStatus);

  if (status === null) {
    const reason = createUnrecognizedCallback('unknown_status', callback);
    log.warn({ rawStatus }, 'Ignoring unrecognized status');
    return ok({ kind: 'ignored', reason });
  }

  // Failed attempts are stored with an empty id; never match them
  if (providerMessageId === '') {
    const reason = createUnrecognizedCallback('unknown_message_id', callback);
    log.warn('Ignoring status callback without message id');
    return ok({ kind: 'ignored', reason });
  }

  const options: UpdateStatusOptions =
    policy === 'forward_only' ? { allowedCurrent: forwardPredecessors(status) } : {};

  const updateResult = await attemptRepo.updateStatusByProviderId(
    providerMessageId,
    status,
    options
  );

  if (updateResult.isErr()) {
    log.error({ error: updateResult.error }, 'Failed to update message status');
    return err(updateResult.error);
  }

  if (updateResult.value > 0) {
    log.info({ status }, 'Message status updated');
    return ok({ kind: 'updated', providerMessageId, status });
  }

  if (policy === 'forward_only') {
    const findResult = await attemptRepo.findByProviderId(providerMessageId);

    if (findResult.isErr()) {
      log.error({ error: findResult.error }, 'Failed to look up message attempt');
      return err(findResult.error);
    }

    if (findResult.value !== null) {
      log.info(
        { status, currentStatus: findResult.value.status },
        'Ignoring status behind stored status'
      );
      return ok({ kind: 'stale', providerMessageId, status });
    }
  }

  const reason = createUnrecognizedCallback('unknown_message_id', callback);
  log.warn({ status }, 'Ignoring status for unknown message');
  return ok({ kind: 'ignored', reason });
};
