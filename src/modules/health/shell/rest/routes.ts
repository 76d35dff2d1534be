/**
 * Health and identity routes
 *
 * Endpoints:
 * - GET /             - Service info and endpoint list
 * - GET /health       - Static identity (service, version, provider)
 * - GET /health/live  - Liveness probe (is the process alive?)
 * - GET /health/ready - Readiness probe (are dependencies reachable?)
 */

import {
  IdentityResponseSchema,
  LivenessResponseSchema,
  ReadinessResponseSchema,
  ServiceInfoResponseSchema,
  type IdentityResponse,
  type LivenessResponse,
  type ReadinessResponse,
  type ServiceIdentity,
  type ServiceInfoResponse,
} from '../../core/types.js';
import { getReadiness } from '../../core/usecases/get-readiness.js';

import type { HealthChecker } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface HealthRoutesDeps {
  identity: ServiceIdentity;
  checkers?: HealthChecker[];
}

export const ENDPOINTS: Record<string, string> = {
  'GET /health': 'Service identity',
  'GET /health/live': 'Liveness probe',
  'GET /health/ready': 'Readiness probe',
  'GET /webhook': 'Meta webhook verification',
  'POST /webhook': 'Meta status and inbound callbacks',
  'POST /twilio-status': 'Twilio status callbacks',
  'POST /twilio-webhook': 'Twilio inbound messages',
  'POST /api/v1/dispatch': 'Start a bulk dispatch',
  'GET /api/v1/messages/stats': 'Message counts per status',
};

/**
 * Factory function to create health routes with dependencies
 */
export const makeHealthRoutes = (deps: HealthRoutesDeps): FastifyPluginAsync => {
  const { identity, checkers = [] } = deps;
  const startTime = Date.now();

  // eslint-disable-next-line @typescript-eslint/require-await -- FastifyPluginAsync pattern requires async
  return async (fastify) => {
    fastify.get<{ Reply: ServiceInfoResponse }>(
      '/',
      { schema: { response: { 200: ServiceInfoResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ ...identity, endpoints: ENDPOINTS });
      }
    );

    fastify.get<{ Reply: IdentityResponse }>(
      '/health',
      { schema: { response: { 200: IdentityResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok', ...identity });
      }
    );

    /**
     * Always 200 while the process runs; dependencies are the readiness
     * probe's job.
     */
    fastify.get<{ Reply: LivenessResponse }>(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async (_request, reply) => {
        return reply.status(200).send({ status: 'ok' });
      }
    );

    /**
     * 503 when a critical dependency (the database) is unavailable.
     */
    fastify.get<{ Reply: ReadinessResponse }>(
      '/health/ready',
      {
        schema: {
          response: {
            200: ReadinessResponseSchema,
            503: ReadinessResponseSchema,
          },
        },
      },
      async (_request, reply) => {
        const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);
        const timestamp = new Date().toISOString();

        const response = await getReadiness(
          { version: identity.version, checkers },
          { uptime: uptimeSeconds, timestamp }
        );

        const httpStatus = response.status === 'unhealthy' ? 503 : 200;

        return reply.status(httpStatus).send(response);
      }
    );
  };
};
