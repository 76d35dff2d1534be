/**
 * Constant-time secret comparison for webhook tokens and API keys.
 */

import { timingSafeEqual } from 'crypto';

/**
 * Compares a provided secret against the configured one in constant time.
 * An empty or missing configured secret never matches.
 */
export const secretsMatch = (provided: string, configured: string | undefined): boolean => {
  if (configured === undefined || configured === '') {
    return false;
  }

  const configuredBuffer = Buffer.from(configured, 'utf-8');
  const providedBuffer = Buffer.from(provided, 'utf-8');

  // Length mismatch still runs a comparison so the timing does not leak it
  if (configuredBuffer.length !== providedBuffer.length) {
    timingSafeEqual(configuredBuffer, configuredBuffer);
    return false;
  }

  return timingSafeEqual(configuredBuffer, providedBuffer);
};
