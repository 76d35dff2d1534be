/**
 * Dispatch Bulk Use Case
 *
 * Sends one rendered message per recipient, in input order, through the
 * shared rate limiter, and records one message attempt per recipient.
 */

import { getErrorMessage } from '../errors.js';
import { recipientTemplateValues, renderTemplate, truncateForStorage } from '../template.js';

import type { ContactDirectory, MessageAttemptRepository, ProviderAdapter } from '../ports.js';
import type { RateLimiter } from '../rate-limiter.js';
import type {
  BulkSendResult,
  DispatchProgressEvent,
  DispatchStatus,
  Recipient,
  RecipientOutcome,
} from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for the dispatch use case.
 */
export interface DispatchBulkDeps {
  provider: ProviderAdapter;
  /** Shared with every other dispatch in the process */
  rateLimiter: RateLimiter;
  attemptRepo: MessageAttemptRepository;
  contacts: ContactDirectory;
  logger: Logger;
}

/**
 * Input for the dispatch use case.
 */
export interface DispatchBulkInput {
  recipients: readonly Recipient[];
  template: string;
  groupId?: string;
  /** Checked between recipients, never during a send */
  signal?: AbortSignal;
}

export type ProgressCallback = (current: number, total: number, status: DispatchStatus) => void;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const resolveContactId = async (
  contacts: ContactDirectory,
  recipient: Recipient,
  log: Logger
): Promise<string | null> => {
  if (recipient.contactId !== undefined) {
    return recipient.contactId;
  }

  const lookupResult = await contacts.lookupByPhone(recipient.phone);
  if (lookupResult.isErr()) {
    log.warn({ phone: recipient.phone, error: lookupResult.error }, 'Contact lookup failed');
    return null;
  }
  return lookupResult.value;
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Runs a dispatch as a lazy sequence of progress events.
 *
 * Each recipient is rendered, throttled, sent and persisted before its event
 * is yielded. The generator's return value is the aggregate result. A
 * recipient that was submitted to the provider is always persisted before
 * cancellation can stop the loop.
 */
export async function* streamBulkDispatch(
  deps: DispatchBulkDeps,
  input: DispatchBulkInput
): AsyncGenerator<DispatchProgressEvent, BulkSendResult, undefined> {
  const { provider, rateLimiter, attemptRepo, contacts, logger } = deps;
  const { recipients, template, signal } = input;
  const groupId = input.groupId ?? null;
  const total = recipients.length;

  const log = logger.child({ usecase: 'dispatchBulk', groupId });

  log.info({ total, provider: provider.provider }, 'Starting bulk dispatch');

  const results: RecipientOutcome[] = [];
  let succeeded = 0;
  let failed = 0;
  let cancelled = false;

  for (const [index, recipient] of recipients.entries()) {
    if (signal?.aborted === true) {
      cancelled = true;
      break;
    }

    const body = renderTemplate(template, recipientTemplateValues(recipient));
    log.debug({ phone: recipient.phone, body: truncateForStorage(body) }, 'Rendered message');

    await rateLimiter.acquire();

    if (signal?.aborted === true) {
      cancelled = true;
      break;
    }

    const sendResult = await provider.send(recipient.phone, body);

    let status: DispatchStatus;
    let providerMessageId = '';
    let error = '';

    if (sendResult.isOk()) {
      status = 'sent';
      providerMessageId = sendResult.value.providerMessageId;
      succeeded += 1;
      log.debug({ phone: recipient.phone, providerMessageId }, 'Message submitted');
    } else {
      status = 'failed';
      error = getErrorMessage(sendResult.error);
      failed += 1;
      log.warn({ phone: recipient.phone, error: sendResult.error }, 'Message send failed');
    }

    const contactId = await resolveContactId(contacts, recipient, log);

    const attemptResult = await attemptRepo.createMessageAttempt({
      groupId,
      contactId,
      phone: recipient.phone,
      direction: 'outbound',
      body: truncateForStorage(body),
      status,
      providerMessageId,
      errorText: error,
    });

    let attemptId: string | null = null;
    if (attemptResult.isOk()) {
      attemptId = attemptResult.value.id;
    } else {
      log.error(
        { phone: recipient.phone, providerMessageId, error: attemptResult.error },
        'Failed to persist message attempt'
      );
    }

    results.push({ phone: recipient.phone, status, providerMessageId, error, attemptId });

    yield {
      current: index + 1,
      total,
      status,
      phone: recipient.phone,
      providerMessageId,
      error,
    };
  }

  if (cancelled) {
    log.warn({ processed: results.length, total }, 'Bulk dispatch cancelled');
  }

  log.info({ total, processed: results.length, succeeded, failed }, 'Bulk dispatch completed');

  return {
    requested: total,
    total: results.length,
    succeeded,
    failed,
    cancelled,
    results,
  };
}

/**
 * Runs a dispatch to completion, reporting each processed recipient to
 * `onProgress`.
 */
export const dispatchBulk = async (
  deps: DispatchBulkDeps,
  input: DispatchBulkInput & { onProgress?: ProgressCallback }
): Promise<BulkSendResult> => {
  const stream = streamBulkDispatch(deps, input);

  for (;;) {
    const next = await stream.next();
    if (next.done === true) {
      return next.value;
    }
    input.onProgress?.(next.value.current, next.value.total, next.value.status);
  }
};
