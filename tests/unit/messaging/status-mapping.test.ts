import { describe, expect, it } from 'vitest';

import {
  forwardPredecessors,
  isCanonicalStatus,
  normalizeStatus,
} from '@/modules/messaging/core/status-mapping.js';

import type { CanonicalStatus } from '@/modules/messaging/core/types.js';

describe('normalizeStatus', () => {
  const twilioCases: [string, CanonicalStatus][] = [
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
  ];

  const metaCases: [string, CanonicalStatus][] = [
    ['sent', 'sent'],
    ['delivered', 'delivered'],
    ['read', 'read'],
    ['failed', 'failed'],
  ];

  it.each(twilioCases)('maps twilio %s to %s', (raw, expected) => {
    expect(normalizeStatus('twilio', raw)).toBe(expected);
  });

  it.each(metaCases)('maps meta %s to %s', (raw, expected) => {
    expect(normalizeStatus('meta', raw)).toBe(expected);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(normalizeStatus('twilio', '  Delivered ')).toBe('delivered');
  });

  it('returns null for statuses outside the provider table', () => {
    expect(normalizeStatus('meta', 'undelivered')).toBeNull();
    expect(normalizeStatus('twilio', 'receiving')).toBeNull();
    expect(normalizeStatus('meta', '')).toBeNull();
  });
});

describe('forwardPredecessors', () => {
  it('lets a status replace itself and earlier stages', () => {
    expect(forwardPredecessors('delivered')).toEqual(['queued', 'sent', 'delivered']);
  });

  it('does not let failed replace a delivered message', () => {
    expect(forwardPredecessors('failed')).not.toContain('delivered');
    expect(forwardPredecessors('failed')).not.toContain('read');
  });

  it('only lets queued replace queued', () => {
    expect(forwardPredecessors('queued')).toEqual(['queued']);
  });
});

describe('isCanonicalStatus', () => {
  it('accepts canonical statuses only', () => {
    expect(isCanonicalStatus('read')).toBe(true);
    expect(isCanonicalStatus('undelivered')).toBe(false);
  });
});
