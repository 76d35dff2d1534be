import { setTimeout as sleep } from 'node:timers/promises';

import type { Clock } from '../core/ports.js';

/**
 * Process clock: monotonic `performance.now()` and timer-based sleep.
 */
export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: async (ms: number): Promise<void> => {
    await sleep(ms);
  },
};
