/**
 * Meta WhatsApp Cloud API adapter.
 *
 * JSON REST with bearer auth against the Graph API messages endpoint.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
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

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface MetaAdapterConfig {
  phoneNumberId: string;
  accessToken: string;
  apiVersion: string;
  fetch: FetchFn;
  logger: Logger;
  /** Defaults to META_REQUEST_TIMEOUT_MS */
  timeoutMs?: number;
}

export const META_GRAPH_BASE_URL = 'https://graph.facebook.com';
export const META_REQUEST_TIMEOUT_MS = 15_000;

const MetaSendResponseSchema = Type.Object({
  messages: Type.Array(Type.Object({ id: Type.String({ minLength: 1 }) }), { minItems: 1 }),
});

const MetaErrorResponseSchema = Type.Object({
  error: Type.Object({ message: Type.String() }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The Cloud API expects the number without '+' or separators.
 */
export const toMetaRecipient = (phone: string): string => phone.replace(/\D/g, '');

export const metaMessagesUrl = (apiVersion: string, phoneNumberId: string): string =>
  `${META_GRAPH_BASE_URL}/${apiVersion}/${phoneNumberId}/messages`;

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

const rejectionMessage = (payload: unknown, text: string): string =>
  Value.Check(MetaErrorResponseSchema, payload) ? payload.error.message : text.slice(0, 200);

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeMetaAdapter = (config: MetaAdapterConfig): ProviderAdapter => {
  const { accessToken, fetch: fetchFn } = config;
  const url = metaMessagesUrl(config.apiVersion, config.phoneNumberId);
  const timeoutMs = config.timeoutMs ?? META_REQUEST_TIMEOUT_MS;
  const log = config.logger.child({ provider: 'meta' });

  return {
    provider: 'meta',

    async send(destination: string, body: string): Promise<Result<SubmittedMessage, SendError>> {
      const to = toMetaRecipient(destination);

      let response: Response;
      let text: string;
      try {
        response = await fetchFn(url, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${accessToken}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            messaging_product: 'whatsapp',
            to,
            type: 'text',
            text: { body },
          }),
          signal: AbortSignal.timeout(timeoutMs),
        });
        text = await response.text();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.warn({ to, error: message }, 'Meta request failed');
        return err(createTransportError('meta', message));
      }

      const payload = parseJson(text);

      if (!response.ok) {
        const rejection = createProviderRejection(
          'meta',
          rejectionMessage(payload, text),
          response.status
        );
        log.warn({ to, status: response.status, error: rejection.message }, 'Meta rejected message');
        return err(rejection);
      }

      if (!Value.Check(MetaSendResponseSchema, payload)) {
        log.warn({ to, status: response.status }, 'Meta response did not include a message id');
        return err(
          createProviderRejection('meta', 'Response did not include a message id', response.status)
        );
      }

      const [first] = payload.messages;
      if (first === undefined) {
        return err(createProviderRejection('meta', 'Response did not include a message id'));
      }

      log.debug({ to, id: first.id }, 'Message accepted');
      return ok({ providerMessageId: first.id });
    },
  };
};
