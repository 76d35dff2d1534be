/**
 * Provider Webhook Routes
 *
 * Meta verification handshake, Meta and Twilio status callbacks, and
 * inbound message callbacks. Paths and response bodies follow what each
 * provider expects.
 */

import {
  parseMetaWebhook,
  parseTwilioInboundForm,
  parseTwilioStatusForm,
} from '../../core/callback-payloads.js';
import { recordInbound } from '../../core/usecases/record-inbound.js';
import { reconcileStatus } from '../../core/usecases/reconcile-status.js';
import { secretsMatch } from '../crypto/secret-compare.js';
import { AckResponseSchema, VerifyQuerySchema, type VerifyQuery } from './schemas.js';

import type { InboundLimiter } from '../../core/inbound-limiter.js';
import type { ContactDirectory, MessageAttemptRepository } from '../../core/ports.js';
import type { ReconciliationPolicy } from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies for the webhook routes.
 */
export interface WebhookRoutesDeps {
  attemptRepo: MessageAttemptRepository;
  contacts: ContactDirectory;
  /** Per-sender cap on recorded inbound messages */
  inboundLimiter: InboundLimiter;
  /** Shared secret for GET /webhook. Handshakes fail while unset. */
  verifyToken: string | undefined;
  policy: ReconciliationPolicy;
  logger: Logger;
}

// Twilio expects TwiML; an empty document sends no reply
const EMPTY_TWIML = '<Response></Response>';

const singleValue = (value: string | string[] | undefined): string | undefined =>
  typeof value === 'string' ? value : undefined;

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates the webhook routes plugin.
 */
export const makeWebhookRoutes = (deps: WebhookRoutesDeps): FastifyPluginAsync => {
  const { attemptRepo, contacts, inboundLimiter, verifyToken, policy, logger } = deps;
  const log = logger.child({ routes: 'webhook' });

  const reconcileDeps = { attemptRepo, policy, logger };
  const inboundDeps = { contacts, attemptRepo, limiter: inboundLimiter, logger };

  // eslint-disable-next-line @typescript-eslint/require-await -- FastifyPluginAsync pattern requires async
  return async (fastify) => {
    // GET /webhook - Meta verification handshake
    fastify.get<{ Querystring: VerifyQuery }>(
      '/webhook',
      { schema: { querystring: VerifyQuerySchema } },
      async (request, reply) => {
        const mode = singleValue(request.query['hub.mode']);
        const token = singleValue(request.query['hub.verify_token']);
        const challenge = singleValue(request.query['hub.challenge']) ?? '';

        if (mode === 'subscribe' && token !== undefined && secretsMatch(token, verifyToken)) {
          log.info('Webhook verification succeeded');
          return reply.status(200).type('text/plain').send(challenge);
        }

        log.warn({ mode }, 'Webhook verification failed');
        return reply.status(403).send();
      }
    );

    // POST /webhook - Meta statuses and inbound messages
    fastify.post(
      '/webhook',
      { schema: { response: { 200: AckResponseSchema } } },
      async (request, reply) => {
        const { statuses, messages } = parseMetaWebhook(request.body);
        let persistenceFailed = false;

        for (const callback of statuses) {
          const result = await reconcileStatus(reconcileDeps, callback);
          if (result.isErr()) {
            persistenceFailed = true;
          }
        }

        for (const message of messages) {
          const result = await recordInbound(inboundDeps, message);
          if (result.isErr()) {
            persistenceFailed = true;
          }
        }

        if (persistenceFailed) {
          return reply.status(500).send({ error: 'Failed to persist webhook payload' });
        }

        log.debug(
          { statuses: statuses.length, messages: messages.length },
          'Meta webhook processed'
        );
        return reply.status(200).send({ status: 'ok' });
      }
    );

    // POST /twilio-status - Twilio status callback (form-encoded)
    fastify.post(
      '/twilio-status',
      { schema: { response: { 200: AckResponseSchema } } },
      async (request, reply) => {
        const callback = parseTwilioStatusForm(request.body);

        if (callback === null) {
          log.warn('Twilio status callback without MessageSid or MessageStatus');
          return reply.status(200).send({ status: 'ok' });
        }

        const result = await reconcileStatus(reconcileDeps, callback);

        if (result.isErr()) {
          return reply.status(500).send({ error: 'Failed to persist status' });
        }

        return reply.status(200).send({ status: 'ok' });
      }
    );

    // POST /twilio-webhook - Twilio inbound message (form-encoded)
    fastify.post('/twilio-webhook', async (request, reply) => {
      const message = parseTwilioInboundForm(request.body);

      if (message === null) {
        log.warn('Twilio inbound callback without sender or text');
      } else {
        // Failures are logged by the use case; the callback is still acknowledged
        await recordInbound(inboundDeps, message);
      }

      return reply.status(200).type('application/xml').send(EMPTY_TWIML);
    });
  };
};
