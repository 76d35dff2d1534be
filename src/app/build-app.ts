/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import formbody from '@fastify/formbody';
import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import {
  makeDispatchRoutes,
  makeWebhookRoutes,
  type ContactDirectory,
  type InboundLimiter,
  type MessageAttemptRepository,
  type ProviderAdapter,
  type RateLimiter,
} from '../modules/messaging/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  logger: Logger;
  attemptRepo: MessageAttemptRepository;
  contacts: ContactDirectory;
  provider: ProviderAdapter;
  /** Shared with every other dispatch in the process */
  rateLimiter: RateLimiter;
  inboundLimiter: InboundLimiter;
  healthCheckers?: HealthChecker[];
  /** Aborted on shutdown so running dispatches stop between recipients */
  shutdownSignal?: AbortSignal;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

/**
 * Creates and configures the Fastify application
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;
  const { config, logger } = deps;

  const app = fastifyLib(fastifyOptions);

  // Global handlers go first: route plugins only inherit what is set before them
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    // Handle known HTTP errors
    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // Provider callbacks from Twilio are application/x-www-form-urlencoded
  await app.register(formbody);

  await app.register(
    makeHealthRoutes({
      identity: {
        service: config.identity.name,
        version: config.identity.version,
        provider: config.provider.selector,
      },
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(
    makeWebhookRoutes({
      attemptRepo: deps.attemptRepo,
      contacts: deps.contacts,
      inboundLimiter: deps.inboundLimiter,
      verifyToken: config.webhooks.verifyToken,
      policy: config.dispatch.reconciliationPolicy,
      logger,
    })
  );

  await app.register(
    makeDispatchRoutes({
      provider: deps.provider,
      rateLimiter: deps.rateLimiter,
      attemptRepo: deps.attemptRepo,
      contacts: deps.contacts,
      apiKey: config.dispatch.apiKey,
      logger,
      ...(deps.shutdownSignal !== undefined ? { signal: deps.shutdownSignal } : {}),
    }),
    { prefix: '/api/v1' }
  );

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
