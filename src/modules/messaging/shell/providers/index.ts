/**
 * Provider selection.
 *
 * Configuration resolves to a closed set of provider variants. A selector or
 * credential problem yields an adapter that rejects every send, so a bad
 * configuration fails per message instead of stopping the process.
 */

import { err, ok, type Result } from 'neverthrow';
import twilio from 'twilio';

import { makeMetaAdapter, type FetchFn } from './meta-adapter.js';
import { makeTwilioAdapter, type TwilioMessagesApi } from './twilio-adapter.js';
import {
  createConfigurationError,
  type ConfigurationError,
  type SendError,
} from '../../core/errors.js';

import type { ProviderAdapter } from '../../core/ports.js';
import type { SubmittedMessage } from '../../core/types.js';
import type { AppConfig } from '@/infra/config/env.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface TwilioSettings {
  kind: 'twilio';
  accountSid: string;
  authToken: string;
  from: string;
  statusCallbackUrl?: string;
}

export interface MetaSettings {
  kind: 'meta';
  phoneNumberId: string;
  accessToken: string;
  apiVersion: string;
}

export type ProviderSettings = TwilioSettings | MetaSettings;

export interface ProviderAdapterDeps {
  logger: Logger;
  /** Defaults to the SDK client built from the settings */
  twilioMessages?: (settings: TwilioSettings) => TwilioMessagesApi;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

// ─────────────────────────────────────────────────────────────────────────────
// Settings
// ─────────────────────────────────────────────────────────────────────────────

const missing = (provider: string, names: string[]): ConfigurationError =>
  createConfigurationError(`${provider} provider is not configured: missing ${names.join(', ')}`);

/**
 * Resolves the provider section of the configuration into one variant.
 */
export const resolveProviderSettings = (
  config: AppConfig['provider']
): Result<ProviderSettings, ConfigurationError> => {
  switch (config.selector) {
    case 'twilio': {
      const { accountSid, authToken, whatsappFrom, statusCallbackUrl } = config.twilio;
      if (accountSid === undefined || authToken === undefined || whatsappFrom === undefined) {
        const names = [
          ...(accountSid === undefined ? ['TWILIO_ACCOUNT_SID'] : []),
          ...(authToken === undefined ? ['TWILIO_AUTH_TOKEN'] : []),
          ...(whatsappFrom === undefined ? ['TWILIO_WHATSAPP_FROM'] : []),
        ];
        return err(missing('twilio', names));
      }
      return ok({
        kind: 'twilio',
        accountSid,
        authToken,
        from: whatsappFrom,
        ...(statusCallbackUrl !== undefined ? { statusCallbackUrl } : {}),
      });
    }
    case 'meta': {
      const { phoneNumberId, accessToken, apiVersion } = config.meta;
      if (phoneNumberId === undefined || accessToken === undefined) {
        const names = [
          ...(phoneNumberId === undefined ? ['WA_PHONE_NUMBER_ID'] : []),
          ...(accessToken === undefined ? ['WA_ACCESS_TOKEN'] : []),
        ];
        return err(missing('meta', names));
      }
      return ok({ kind: 'meta', phoneNumberId, accessToken, apiVersion });
    }
    default:
      return err(
        createConfigurationError(
          `Unknown provider '${config.selector}' (expected 'twilio' or 'meta')`
        )
      );
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Adapter used when no provider could be configured.
 */
export const makeUnconfiguredAdapter = (
  error: ConfigurationError,
  logger: Logger
): ProviderAdapter => {
  const log = logger.child({ provider: 'unconfigured' });

  return {
    provider: null,
    send(destination: string): Promise<Result<SubmittedMessage, SendError>> {
      log.warn({ to: destination, error: error.message }, 'Send rejected: provider not configured');
      return Promise.resolve(err(error));
    },
  };
};

const defaultTwilioMessages = (settings: TwilioSettings): TwilioMessagesApi =>
  twilio(settings.accountSid, settings.authToken).messages;

export const makeProviderAdapter = (
  settings: Result<ProviderSettings, ConfigurationError>,
  deps: ProviderAdapterDeps
): ProviderAdapter => {
  const { logger } = deps;

  if (settings.isErr()) {
    return makeUnconfiguredAdapter(settings.error, logger);
  }

  const selected = settings.value;

  switch (selected.kind) {
    case 'twilio': {
      // The SDK validates credentials in its constructor and throws.
      let messages: TwilioMessagesApi;
      try {
        messages = (deps.twilioMessages ?? defaultTwilioMessages)(selected);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error({ error: reason }, 'Twilio client could not be created');
        return makeUnconfiguredAdapter(
          createConfigurationError(`twilio provider is not configured: ${reason}`),
          logger
        );
      }
      return makeTwilioAdapter({
        messages,
        from: selected.from,
        ...(selected.statusCallbackUrl !== undefined
          ? { statusCallbackUrl: selected.statusCallbackUrl }
          : {}),
        logger,
      });
    }
    case 'meta':
      return makeMetaAdapter({
        phoneNumberId: selected.phoneNumberId,
        accessToken: selected.accessToken,
        apiVersion: selected.apiVersion,
        fetch: deps.fetch ?? fetch,
        logger,
      });
    default: {
      const unreachable: never = selected;
      throw new Error(`Unhandled provider settings: ${JSON.stringify(unreachable)}`);
    }
  }
};
