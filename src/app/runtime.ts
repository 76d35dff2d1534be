/**
 * Runtime composition
 *
 * Builds the process-wide messaging dependencies once. The HTTP server and
 * the send-broadcast script both start from here, so they share one rate
 * limiter and one lifecycle.
 */

import { makeAppLifecycle, type AppLifecycle } from './lifecycle.js';
import { initDatabase, migrateToLatest, type MessagingDbClient } from '../infra/database/client.js';
import {
  makeContactRepo,
  makeInboundLimiter,
  makeMessageAttemptRepo,
  makeProviderAdapter,
  makeRateLimiter,
  resolveProviderSettings,
  systemClock,
  type Clock,
  type ContactDirectory,
  type InboundLimiter,
  type MessageAttemptRepository,
  type ProviderAdapter,
  type ProviderAdapterDeps,
  type RateLimiter,
} from '../modules/messaging/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface Runtime {
  db: MessagingDbClient;
  attemptRepo: MessageAttemptRepository;
  contacts: ContactDirectory;
  provider: ProviderAdapter;
  rateLimiter: RateLimiter;
  inboundLimiter: InboundLimiter;
  lifecycle: AppLifecycle;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  config: AppConfig;
  logger: Logger;
  clock?: Clock;
  providerDeps?: Omit<ProviderAdapterDeps, 'logger'>;
}

export const createRuntime = (options: RuntimeOptions): Runtime => {
  const { config, logger } = options;

  const db = initDatabase(config);
  const attemptRepo = makeMessageAttemptRepo({ db, logger });
  const contacts = makeContactRepo({ db, logger });

  const settings = resolveProviderSettings(config.provider);
  if (settings.isErr()) {
    logger.warn({ error: settings.error.message }, 'Provider not configured; sends will be rejected');
  }
  const provider = makeProviderAdapter(settings, { ...options.providerDeps, logger });

  const clock = options.clock ?? systemClock;
  const rateLimiter = makeRateLimiter({
    messagesPerSecond: config.dispatch.messagesPerSecond,
    clock,
    logger,
  });
  const inboundLimiter = makeInboundLimiter({ clock });

  const lifecycle = makeAppLifecycle({
    steps: [
      {
        name: 'migrate-database',
        run: async () => {
          const result = await migrateToLatest(db);
          return result.map((applied) => {
            logger.info({ applied }, 'Database migrations applied');
          });
        },
      },
    ],
    logger,
  });

  return {
    db,
    attemptRepo,
    contacts,
    provider,
    rateLimiter,
    inboundLimiter,
    lifecycle,
    close: () => db.destroy(),
  };
};
