/**
 * Messaging Module - Ports (Interfaces)
 *
 * Provider, persistence and time contracts used by the use cases.
 */

import type { AttemptWriteError, DatabaseError, SendError } from './errors.js';
import type {
  CanonicalStatus,
  MessageAttempt,
  MessageDirection,
  ProviderName,
  SubmittedMessage,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Provider Adapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Uniform send over a messaging provider.
 * Never rejects: provider and transport failures resolve to err().
 */
export interface ProviderAdapter {
  /** Backend name, or null for an adapter that could not be configured */
  readonly provider: ProviderName | null;
  send(destination: string, body: string): Promise<Result<SubmittedMessage, SendError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Message Attempt Repository
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Input for creating a message attempt.
 * The outcome is written with the row, so the provider id never lands in a
 * second statement.
 */
export interface CreateMessageAttemptInput {
  groupId: string | null;
  contactId: string | null;
  phone: string;
  direction: MessageDirection;
  body: string;
  status: CanonicalStatus;
  providerMessageId: string;
  errorText: string;
}

export interface UpdateStatusOptions {
  /**
   * Only update when the stored status is one of these.
   * Omitted means unconditional.
   */
  allowedCurrent?: readonly CanonicalStatus[];
}

/**
 * Row count per (direction, status) pair.
 */
export interface StatusCountRow {
  direction: MessageDirection;
  status: string;
  count: number;
}

export interface MessageAttemptRepository {
  /**
   * Inserts one attempt.
   * Returns DuplicateAttempt if a non-empty provider id is already stored.
   */
  createMessageAttempt(
    input: CreateMessageAttemptInput
  ): Promise<Result<MessageAttempt, AttemptWriteError>>;

  /**
   * Single atomic UPDATE keyed by provider message id.
   * Returns the number of rows changed (0 when unknown or filtered out).
   */
  updateStatusByProviderId(
    providerMessageId: string,
    status: CanonicalStatus,
    options?: UpdateStatusOptions
  ): Promise<Result<number, DatabaseError>>;

  findByProviderId(providerMessageId: string): Promise<Result<MessageAttempt | null, DatabaseError>>;

  countByStatus(filter: { groupId?: string }): Promise<Result<StatusCountRow[], DatabaseError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Contact Directory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Contacts are owned elsewhere; the messaging module only resolves and
 * registers them by phone.
 */
export interface ContactDirectory {
  lookupByPhone(phone: string): Promise<Result<string | null, DatabaseError>>;

  /** Creates or refreshes a contact, returning its id */
  upsert(contact: { phone: string; name: string }): Promise<Result<string, DatabaseError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Clock
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Monotonic time source. Injected so rate limiting can be tested without
 * real sleeps.
 */
export interface Clock {
  /** Milliseconds on a monotonic scale */
  now(): number;
  sleep(ms: number): Promise<void>;
}
