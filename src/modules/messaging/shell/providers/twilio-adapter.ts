/**
 * Twilio WhatsApp adapter.
 *
 * Form-encoded REST with HTTP Basic auth, through the official SDK's
 * messages resource.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createProviderRejection,
  createTransportError,
  type SendError,
} from '../../core/errors.js';

import type { ProviderAdapter } from '../../core/ports.js';
import type { SubmittedMessage } from '../../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The part of the SDK's `client.messages` this adapter uses.
 */
export interface TwilioMessagesApi {
  create(params: {
    from: string;
    to: string;
    body: string;
    statusCallback?: string;
  }): Promise<{ sid: string }>;
}

export interface TwilioAdapterConfig {
  messages: TwilioMessagesApi;
  /** Sender, e.g. "whatsapp:+14155238886" */
  from: string;
  statusCallbackUrl?: string;
  logger: Logger;
}

/**
 * Shape of the SDK's RestException.
 */
interface TwilioRestError {
  status: number;
  message: string;
  code?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const WHATSAPP_PREFIX = 'whatsapp:';

export const toTwilioAddress = (phone: string): string =>
  phone.startsWith(WHATSAPP_PREFIX) ? phone : `${WHATSAPP_PREFIX}${phone}`;

const isTwilioRestError = (error: unknown): error is TwilioRestError =>
  typeof error === 'object' &&
  error !== null &&
  'status' in error &&
  typeof error.status === 'number' &&
  'message' in error &&
  typeof error.message === 'string';

/**
 * Maps anything the SDK throws to a send error.
 * REST errors carry the provider's HTTP status and are rejections; anything
 * else never got an answer from the provider.
 */
export const mapTwilioError = (error: unknown): SendError => {
  if (isTwilioRestError(error)) {
    return createProviderRejection('twilio', error.message, error.status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return createTransportError('twilio', message);
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeTwilioAdapter = (config: TwilioAdapterConfig): ProviderAdapter => {
  const { messages, from, statusCallbackUrl } = config;
  const log = config.logger.child({ provider: 'twilio' });

  return {
    provider: 'twilio',

    async send(destination: string, body: string): Promise<Result<SubmittedMessage, SendError>> {
      const to = toTwilioAddress(destination);

      try {
        const message = await messages.create({
          from,
          to,
          body,
          ...(statusCallbackUrl !== undefined ? { statusCallback: statusCallbackUrl } : {}),
        });

        if (message.sid === '') {
          return err(createProviderRejection('twilio', 'Response did not include a message sid'));
        }

        log.debug({ to, sid: message.sid }, 'Message accepted');
        return ok({ providerMessageId: message.sid });
      } catch (error) {
        const sendError = mapTwilioError(error);
        log.warn({ to, error: sendError }, 'Twilio send failed');
        return err(sendError);
      }
    },
  };
};
