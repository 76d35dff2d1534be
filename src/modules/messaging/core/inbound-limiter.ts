/**
 * Per-sender inbound limit.
 *
 * Sliding window over the shared clock: a sender gets at most
 * `maxMessages` recorded messages per `windowMs`. Anything above that is
 * dropped before it reaches storage.
 */

import type { Clock } from './ports.js';

export const DEFAULT_INBOUND_MAX_MESSAGES = 10;
export const DEFAULT_INBOUND_WINDOW_MS = 60_000;

export interface InboundLimiter {
  /** Counts the message and reports whether it may be recorded */
  allow(phone: string): boolean;
}

export interface InboundLimiterOptions {
  clock: Clock;
  maxMessages?: number;
  windowMs?: number;
}

export const makeInboundLimiter = (options: InboundLimiterOptions): InboundLimiter => {
  const { clock } = options;
  const maxMessages = options.maxMessages ?? DEFAULT_INBOUND_MAX_MESSAGES;
  const windowMs = options.windowMs ?? DEFAULT_INBOUND_WINDOW_MS;
  const seen = new Map<string, number[]>();

  return {
    allow(phone: string): boolean {
      const now = clock.now();
      const recent = (seen.get(phone) ?? []).filter((at) => now - at < windowMs);

      if (recent.length >= maxMessages) {
        seen.set(phone, recent);
        return false;
      }

      recent.push(now);
      seen.set(phone, recent);
      return true;
    },
  };
};
