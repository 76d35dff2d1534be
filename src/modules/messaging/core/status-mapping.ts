/**
 * Provider status vocabularies mapped onto the canonical lifecycle.
 */

import type { CanonicalStatus, ProviderName } from './types.js';

const TWILIO_STATUSES = new Map<string, CanonicalStatus>([
  ['accepted', 'queued'],
  ['scheduled', 'queued'],
  ['queued', 'queued'],
  ['sending', 'queued'],
  ['sent', 'sent'],
  ['delivered', 'delivered'],
  ['read', 'read'],
  ['failed', 'failed'],
  ['undelivered', 'failed'],
  ['canceled', 'failed'],
]);

const META_STATUSES = new Map<string, CanonicalStatus>([
  ['sent', 'sent'],
  ['delivered', 'delivered'],
  ['read', 'read'],
  ['failed', 'failed'],
]);

const STATUS_TABLES: Record<ProviderName, ReadonlyMap<string, CanonicalStatus>> = {
  twilio: TWILIO_STATUSES,
  meta: META_STATUSES,
};

/**
 * Maps a provider status string to the canonical status.
 * Returns null for anything not listed in the provider's table.
 */
export const normalizeStatus = (provider: ProviderName, rawStatus: string): CanonicalStatus | null =>
  STATUS_TABLES[provider].get(rawStatus.trim().toLowerCase()) ?? null;

/**
 * Stored statuses a forward-only update to `next` may replace.
 * Each status includes itself so repeating a callback stays a no-op update.
 */
const FORWARD_PREDECESSORS: Record<CanonicalStatus, readonly CanonicalStatus[]> = {
  queued: ['queued'],
  sent: ['queued', 'sent'],
  delivered: ['queued', 'sent', 'delivered'],
  read: ['queued', 'sent', 'delivered', 'read'],
  failed: ['queued', 'sent', 'failed'],
};

export const forwardPredecessors = (next: CanonicalStatus): readonly CanonicalStatus[] =>
  FORWARD_PREDECESSORS[next];

export const isCanonicalStatus = (value: string): value is CanonicalStatus =>
  value === 'queued' ||
  value === 'sent' ||
  value === 'delivered' ||
  value === 'read' ||
  value === 'failed';
