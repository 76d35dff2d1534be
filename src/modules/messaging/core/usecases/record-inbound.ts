/**
 * Record Inbound Use Case
 *
 * Registers the sender as a contact and stores the message as an inbound
 * attempt. Replies and menus are handled elsewhere.
 *
 * Providers redeliver callbacks they consider unacknowledged; a message id
 * that is already stored is reported as a duplicate, not an error.
 */

import { ok, err, type Result } from 'neverthrow';

import { truncateForStorage } from '../template.js';

import type { DatabaseError } from '../errors.js';
import type { InboundLimiter } from '../inbound-limiter.js';
import type { ContactDirectory, MessageAttemptRepository } from '../ports.js';
import type { InboundMessage, MessageAttempt } from '../types.js';
import type { Logger } from 'pino';

export interface RecordInboundDeps {
  contacts: ContactDirectory;
  attemptRepo: MessageAttemptRepository;
  limiter: InboundLimiter;
  logger: Logger;
}

export type RecordInboundOutcome =
  | { kind: 'recorded'; attempt: MessageAttempt }
  | { kind: 'duplicate'; providerMessageId: string }
  | { kind: 'throttled' };

export const recordInbound = async (
  deps: RecordInboundDeps,
  message: InboundMessage
): Promise<Result<RecordInboundOutcome, DatabaseError>> => {
  const { contacts, attemptRepo, limiter, logger } = deps;
  const log = logger.child({ usecase: 'recordInbound', provider: message.provider });

  if (!limiter.allow(message.phone)) {
    log.warn({ phone: message.phone }, 'Inbound limit reached, message dropped');
    return ok({ kind: 'throttled' });
  }

  const contactResult = await contacts.upsert({ phone: message.phone, name: message.name });
  if (contactResult.isErr()) {
    log.error({ phone: message.phone, error: contactResult.error }, 'Failed to upsert contact');
    return err(contactResult.error);
  }

  const attemptResult = await attemptRepo.createMessageAttempt({
    groupId: null,
    contactId: contactResult.value,
    phone: message.phone,
    direction: 'inbound',
    body: truncateForStorage(message.body),
    status: 'delivered',
    providerMessageId: message.providerMessageId,
    errorText: '',
  });

  if (attemptResult.isErr()) {
    const error = attemptResult.error;
    if (error.type === 'DuplicateAttempt') {
      log.info({ providerMessageId: error.providerMessageId }, 'Inbound message already recorded');
      return ok({ kind: 'duplicate', providerMessageId: error.providerMessageId });
    }
    log.error({ phone: message.phone, error }, 'Failed to store inbound message');
    return err(error);
  }

  log.info({ phone: message.phone, attemptId: attemptResult.value.id }, 'Inbound message recorded');
  return ok({ kind: 'recorded', attempt: attemptResult.value });
};
