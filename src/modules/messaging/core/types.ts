/**
 * Messaging Module - Core Types
 *
 * Types for bulk dispatch and delivery-status reconciliation.
 */

import type { UnrecognizedCallback } from './errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maximum number of characters of a rendered body kept in storage.
 */
export const BODY_STORAGE_LIMIT = 500;

/**
 * Rate used when the configured rate is zero, negative or not a number.
 */
export const FALLBACK_MESSAGES_PER_SECOND = 1;

// ─────────────────────────────────────────────────────────────────────────────
// Delivery Status
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Provider-independent delivery lifecycle.
 *
 * Progression: queued → sent → delivered → read
 *                     ↘ failed (from queued or sent)
 *
 * Callbacks may arrive out of order; see ReconciliationPolicy.
 */
export type CanonicalStatus = 'queued' | 'sent' | 'delivered' | 'read' | 'failed';

export const CANONICAL_STATUSES: readonly CanonicalStatus[] = [
  'queued',
  'sent',
  'delivered',
  'read',
  'failed',
] as const;

/**
 * How a status callback is applied to a stored attempt.
 *
 * - last_write_wins: overwrite unconditionally (callback arrival order decides)
 * - forward_only: only apply when the stored status may precede the new one
 */
export type ReconciliationPolicy = 'last_write_wins' | 'forward_only';

// ─────────────────────────────────────────────────────────────────────────────
// Providers
// ─────────────────────────────────────────────────────────────────────────────

export type ProviderName = 'twilio' | 'meta';

/**
 * A message accepted by the provider.
 */
export interface SubmittedMessage {
  providerMessageId: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Recipients & Attempts
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One entry of a dispatch call. Phone numbers are expected to be normalized.
 */
export interface Recipient {
  phone: string;
  firstName?: string;
  lastName?: string;
  /** Single display name, preferred over first/last when present */
  name?: string;
  /** Known contact id; looked up by phone when absent */
  contactId?: string;
}

export type MessageDirection = 'outbound' | 'inbound';

/**
 * A persisted send attempt or inbound message.
 */
export interface MessageAttempt {
  id: string;
  groupId: string | null;
  contactId: string | null;
  phone: string;
  direction: MessageDirection;
  /** Rendered body, truncated to BODY_STORAGE_LIMIT */
  body: string;
  status: CanonicalStatus;
  /** Empty until a provider assigns one */
  providerMessageId: string;
  /** Empty on success */
  errorText: string;
  createdAt: Date;
  updatedAt: Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Dispatch
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Status a dispatch assigns to a recipient.
 */
export type DispatchStatus = Extract<CanonicalStatus, 'sent' | 'failed'>;

/**
 * Per-recipient result of a dispatch, in input order.
 */
export interface RecipientOutcome {
  phone: string;
  status: DispatchStatus;
  providerMessageId: string;
  error: string;
  /** Stored attempt id, null when the attempt could not be persisted */
  attemptId: string | null;
}

/**
 * Emitted once per processed recipient.
 */
export interface DispatchProgressEvent {
  /** 1-based index of the recipient just processed */
  current: number;
  total: number;
  status: DispatchStatus;
  phone: string;
  providerMessageId: string;
  error: string;
}

export interface BulkSendResult {
  /** Number of recipients passed in */
  requested: number;
  /** Number of recipients processed (less than requested when cancelled) */
  total: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
  results: RecipientOutcome[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Reconciliation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A status callback after transport-specific parsing.
 */
export interface StatusCallback {
  provider: ProviderName;
  providerMessageId: string;
  rawStatus: string;
}

export type ReconcileOutcome =
  | { kind: 'updated'; providerMessageId: string; status: CanonicalStatus }
  | { kind: 'stale'; providerMessageId: string; status: CanonicalStatus }
  | { kind: 'ignored'; reason: UnrecognizedCallback };

// ─────────────────────────────────────────────────────────────────────────────
// Inbound & Stats
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A message received from a contact.
 */
export interface InboundMessage {
  provider: ProviderName;
  /** Provider's id for the message, empty when the callback carries none */
  providerMessageId: string;
  phone: string;
  /** Sender display name reported by the provider, may be empty */
  name: string;
  /** Text body, or the id of the selected interactive reply */
  body: string;
}

export interface MessageStats {
  /** Outbound attempts, all statuses */
  total: number;
  queued: number;
  sent: number;
  delivered: number;
  read: number;
  failed: number;
  inbound: number;
}
