/**
 * Shared send-rate limiter.
 *
 * One instance is created by the composition root and handed to every
 * dispatch that shares the provider's throughput ceiling. Concurrent
 * dispatches therefore throttle each other.
 */

import { FALLBACK_MESSAGES_PER_SECOND } from './types.js';

import type { Clock } from './ports.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RateLimiter {
  /** Minimum spacing between two permitted sends */
  readonly intervalMs: number;
  /** Resolves when the caller may send */
  acquire(): Promise<void>;
}

export interface RateLimiterOptions {
  messagesPerSecond: number;
  clock: Clock;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeRateLimiter = (options: RateLimiterOptions): RateLimiter => {
  const { clock } = options;
  const log = options.logger.child({ component: 'RateLimiter' });

  let messagesPerSecond = options.messagesPerSecond;
  if (!Number.isFinite(messagesPerSecond) || messagesPerSecond <= 0) {
    log.warn(
      { configured: messagesPerSecond, fallback: FALLBACK_MESSAGES_PER_SECOND },
      'Invalid send rate, using fallback'
    );
    messagesPerSecond = FALLBACK_MESSAGES_PER_SECOND;
  }

  const intervalMs = 1000 / messagesPerSecond;
  let lastSlot: number | null = null;

  return {
    intervalMs,

    async acquire(): Promise<void> {
      // The slot is reserved before suspending, so callers that arrive while
      // another one waits queue up behind it.
      const now = clock.now();
      const slot = lastSlot === null ? now : Math.max(now, lastSlot + intervalMs);
      lastSlot = slot;

      const waitMs = slot - now;
      if (waitMs > 0) {
        await clock.sleep(waitMs);
      }
    },
  };
};
