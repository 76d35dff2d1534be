/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { createRuntime } from './app/runtime.js';
import { parseEnv, createConfig, validateConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeDbHealthChecker } from './modules/health/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: config.identity.name,
    pretty: config.logger.pretty,
  });

  logger.info(
    { server: config.server, provider: config.provider.selector, version: config.identity.version },
    'Starting API server'
  );

  for (const warning of validateConfig(config)) {
    logger.warn(warning);
  }

  const runtime = createRuntime({ config, logger });

  const initResult = await runtime.lifecycle.initialize();
  if (initResult.isErr()) {
    logger.fatal({ error: initResult.error }, 'Initialization failed');
    await runtime.close();
    process.exit(1);
  }

  const shutdownController = new AbortController();

  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps: {
      config,
      logger,
      attemptRepo: runtime.attemptRepo,
      contacts: runtime.contacts,
      provider: runtime.provider,
      rateLimiter: runtime.rateLimiter,
      inboundLimiter: runtime.inboundLimiter,
      healthCheckers: [makeDbHealthChecker(runtime.db, { name: 'database' })],
      shutdownSignal: shutdownController.signal,
    },
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    shutdownController.abort();

    try {
      await app.close();
      await runtime.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
