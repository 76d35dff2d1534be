#!/usr/bin/env tsx

/**
 * Broadcast Send Script
 *
 * Sends one templated message to every recipient in a JSON file, through the
 * configured provider and rate limit, recording each attempt.
 *
 * Usage:
 *   tsx scripts/send-broadcast.ts --recipients contacts.json --template "Hi {name}!"
 *   tsx scripts/send-broadcast.ts --recipients contacts.json --template "Hi {first_name}" --group spring-launch
 *
 * Options:
 *   --recipients: JSON array of { phone, firstName?, lastName?, name?, contactId? } (required)
 *   --template: Message text; {first_name}, {last_name}, {name} and {phone} are substituted (required)
 *   --group: Group id the attempts are tagged with (optional)
 *
 * Ctrl+C stops the broadcast after the recipient in progress.
 */

import { readFile } from 'node:fs/promises';

import {
  USAGE,
  makeProgressThrottle,
  parseBroadcastArgs,
  parseRecipients,
} from './lib/broadcast-cli.js';
import { createRuntime } from '../src/app/runtime.js';
import { createConfig, parseEnv, validateConfig } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { streamBulkDispatch } from '../src/modules/messaging/index.js';

const main = async (): Promise<number> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'send-broadcast',
    pretty: config.logger.pretty,
  });

  const argsResult = parseBroadcastArgs(process.argv.slice(2));
  if (argsResult.isErr()) {
    logger.error(argsResult.error);
    logger.info(USAGE);
    return 2;
  }
  const options = argsResult.value;

  const content: unknown = JSON.parse(await readFile(options.recipientsFile, 'utf-8'));
  const recipientsResult = parseRecipients(content);
  if (recipientsResult.isErr()) {
    logger.error(recipientsResult.error);
    return 2;
  }
  const recipients = recipientsResult.value;

  for (const warning of validateConfig(config)) {
    logger.warn(warning);
  }

  const runtime = createRuntime({ config, logger });

  try {
    const initResult = await runtime.lifecycle.initialize();
    if (initResult.isErr()) {
      logger.fatal({ error: initResult.error }, 'Initialization failed');
      return 1;
    }

    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupted, stopping after the current recipient');
      controller.abort();
    });

    const stream = streamBulkDispatch(
      {
        provider: runtime.provider,
        rateLimiter: runtime.rateLimiter,
        attemptRepo: runtime.attemptRepo,
        contacts: runtime.contacts,
        logger,
      },
      {
        recipients,
        template: options.template,
        signal: controller.signal,
        ...(options.groupId !== undefined ? { groupId: options.groupId } : {}),
      }
    );

    const shouldReport = makeProgressThrottle(1000, () => Date.now());

    for (;;) {
      const next = await stream.next();
      if (next.done === true) {
        const result = next.value;
        logger.info(
          {
            requested: result.requested,
            processed: result.total,
            succeeded: result.succeeded,
            failed: result.failed,
            cancelled: result.cancelled,
          },
          'Broadcast finished'
        );
        return result.failed > 0 || result.cancelled ? 1 : 0;
      }

      const event = next.value;
      if (shouldReport(event)) {
        logger.info(
          { current: event.current, total: event.total, status: event.status },
          `Progress ${String(event.current)}/${String(event.total)}`
        );
      }
    }
  } finally {
    await runtime.close();
  }
};

process.exitCode = await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  return 1;
});
