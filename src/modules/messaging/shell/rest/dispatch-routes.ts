/**
 * Dispatch Routes
 *
 * Authenticated API for starting a bulk dispatch and reading message stats.
 */

import { dispatchBulk, type DispatchBulkDeps } from '../../core/usecases/dispatch-bulk.js';
import { getMessageStats } from '../../core/usecases/get-message-stats.js';
import { secretsMatch } from '../crypto/secret-compare.js';
import {
  BulkSendResultSchema,
  DispatchRequestSchema,
  ErrorResponseSchema,
  MessageStatsSchema,
  StatsQuerySchema,
  type DispatchRequest,
  type StatsQuery,
} from './schemas.js';

import type { Recipient } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DispatchRoutesDeps extends DispatchBulkDeps {
  /** API key expected in `x-api-key`. If undefined, all requests are rejected. */
  apiKey: string | undefined;
  /** Aborted on shutdown; running dispatches stop between recipients */
  signal?: AbortSignal;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toRecipient = (input: DispatchRequest['recipients'][number]): Recipient => ({
  phone: input.phone,
  ...(input.firstName !== undefined ? { firstName: input.firstName } : {}),
  ...(input.lastName !== undefined ? { lastName: input.lastName } : {}),
  ...(input.name !== undefined ? { name: input.name } : {}),
  ...(input.contactId !== undefined ? { contactId: input.contactId } : {}),
});

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeDispatchRoutes = (deps: DispatchRoutesDeps): FastifyPluginAsync => {
  const { apiKey, signal, ...dispatchDeps } = deps;
  const log = deps.logger.child({ routes: 'dispatch' });

  // eslint-disable-next-line @typescript-eslint/require-await -- FastifyPluginAsync pattern requires async
  return async (fastify) => {
    // Fail-closed: no configured key rejects everything
    const authenticateApiKey = (
      request: FastifyRequest,
      reply: FastifyReply,
      done: (err?: Error) => void
    ): void => {
      const providedKey = request.headers['x-api-key'];

      if (typeof providedKey !== 'string' || !secretsMatch(providedKey, apiKey)) {
        log.warn({ hasKey: typeof providedKey === 'string' }, 'Invalid or missing API key');
        reply.status(401).send({ error: 'Invalid API key' });
        return;
      }
      done();
    };

    // POST /api/v1/dispatch
    fastify.post<{ Body: DispatchRequest }>(
      '/dispatch',
      {
        preHandler: authenticateApiKey,
        schema: {
          body: DispatchRequestSchema,
          response: { 200: BulkSendResultSchema, 401: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const { recipients, template, groupId } = request.body;

        log.info({ recipients: recipients.length, groupId }, 'Dispatch requested');

        const result = await dispatchBulk(dispatchDeps, {
          recipients: recipients.map(toRecipient),
          template,
          ...(groupId !== undefined ? { groupId } : {}),
          ...(signal !== undefined ? { signal } : {}),
        });

        return reply.status(200).send(result);
      }
    );

    // GET /api/v1/messages/stats
    fastify.get<{ Querystring: StatsQuery }>(
      '/messages/stats',
      {
        preHandler: authenticateApiKey,
        schema: {
          querystring: StatsQuerySchema,
          response: { 200: MessageStatsSchema, 401: ErrorResponseSchema, 500: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const { groupId } = request.query;
        const result = await getMessageStats(
          { attemptRepo: dispatchDeps.attemptRepo, logger: dispatchDeps.logger },
          groupId !== undefined ? { groupId } : {}
        );

        if (result.isErr()) {
          return reply.status(500).send({ error: 'Failed to load message stats' });
        }

        return reply.status(200).send(result.value);
      }
    );
  };
};
