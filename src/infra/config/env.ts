/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/** Default throughput ceiling shared by every dispatch */
export const DEFAULT_MESSAGES_PER_SECOND = 50;

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 8000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  DATABASE_URL: Type.String({ minLength: 1 }),

  // Provider selection is a free string: an unknown value degrades to a
  // rejecting adapter instead of failing startup.
  WA_PROVIDER: Type.String({ default: 'twilio' }),

  // Twilio
  TWILIO_ACCOUNT_SID: Type.Optional(Type.String()),
  TWILIO_AUTH_TOKEN: Type.Optional(Type.String()),
  TWILIO_WHATSAPP_FROM: Type.Optional(Type.String()),
  TWILIO_STATUS_CALLBACK_URL: Type.Optional(Type.String()),

  // Meta Cloud API
  WA_PHONE_NUMBER_ID: Type.Optional(Type.String()),
  WA_ACCESS_TOKEN: Type.Optional(Type.String()),
  WA_API_VERSION: Type.String({ default: 'v21.0' }),
  WA_VERIFY_TOKEN: Type.Optional(Type.String()),

  // Dispatch
  WA_MESSAGES_PER_SECOND: Type.Number({ default: DEFAULT_MESSAGES_PER_SECOND }),
  DISPATCH_API_KEY: Type.Optional(Type.String()),
  RECONCILIATION_POLICY: Type.Union(
    [Type.Literal('last_write_wins'), Type.Literal('forward_only')],
    { default: 'last_write_wins' }
  ),

  APP_VERSION: Type.String({ default: '0.1.0' }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Parses an integer env var, falling back when it is missing or not a number.
 */
const parseIntOr = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 8000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    WA_PROVIDER: (env['WA_PROVIDER'] ?? 'twilio').trim().toLowerCase(),
    TWILIO_ACCOUNT_SID: env['TWILIO_ACCOUNT_SID'],
    TWILIO_AUTH_TOKEN: env['TWILIO_AUTH_TOKEN'],
    TWILIO_WHATSAPP_FROM: env['TWILIO_WHATSAPP_FROM'],
    TWILIO_STATUS_CALLBACK_URL: env['TWILIO_STATUS_CALLBACK_URL'],
    WA_PHONE_NUMBER_ID: env['WA_PHONE_NUMBER_ID'],
    WA_ACCESS_TOKEN: env['WA_ACCESS_TOKEN'],
    WA_API_VERSION: env['WA_API_VERSION'] ?? 'v21.0',
    WA_VERIFY_TOKEN: env['WA_VERIFY_TOKEN'],
    WA_MESSAGES_PER_SECOND: parseIntOr(env['WA_MESSAGES_PER_SECOND'], DEFAULT_MESSAGES_PER_SECOND),
    DISPATCH_API_KEY: env['DISPATCH_API_KEY'],
    RECONCILIATION_POLICY: env['RECONCILIATION_POLICY'] ?? 'last_write_wins',
    APP_VERSION: env['APP_VERSION'] ?? '0.1.0',
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Treats empty strings as unset.
 */
const nonEmpty = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value;

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  provider: {
    /** Raw selector; resolved into a provider variant by the messaging module */
    selector: env.WA_PROVIDER,
    twilio: {
      accountSid: nonEmpty(env.TWILIO_ACCOUNT_SID),
      authToken: nonEmpty(env.TWILIO_AUTH_TOKEN),
      whatsappFrom: nonEmpty(env.TWILIO_WHATSAPP_FROM),
      statusCallbackUrl: nonEmpty(env.TWILIO_STATUS_CALLBACK_URL),
    },
    meta: {
      phoneNumberId: nonEmpty(env.WA_PHONE_NUMBER_ID),
      accessToken: nonEmpty(env.WA_ACCESS_TOKEN),
      apiVersion: env.WA_API_VERSION,
    },
  },
  webhooks: {
    /** Shared secret for the Meta verification handshake */
    verifyToken: nonEmpty(env.WA_VERIFY_TOKEN),
  },
  dispatch: {
    messagesPerSecond: env.WA_MESSAGES_PER_SECOND,
    /** API key for the dispatch REST endpoint. Requests are rejected when unset. */
    apiKey: nonEmpty(env.DISPATCH_API_KEY),
    reconciliationPolicy: env.RECONCILIATION_POLICY,
  },
  identity: {
    name: 'broadcast-relay',
    version: env.APP_VERSION,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;

/**
 * Returns configuration warnings worth logging at startup.
 * None of these stop the process; an unusable provider degrades per message.
 */
export const validateConfig = (config: AppConfig): string[] => {
  const warnings: string[] = [];
  const { provider, webhooks, dispatch } = config;

  if (webhooks.verifyToken === undefined) {
    warnings.push('WA_VERIFY_TOKEN not set - webhook verification handshake will always fail');
  }

  if (dispatch.apiKey === undefined) {
    warnings.push('DISPATCH_API_KEY not set - dispatch endpoint rejects all requests');
  }

  if (dispatch.messagesPerSecond <= 0) {
    warnings.push(
      `WA_MESSAGES_PER_SECOND=${String(dispatch.messagesPerSecond)} is not positive - falling back to 1 message per second`
    );
  }

  if (provider.selector === 'twilio') {
    if (provider.twilio.accountSid === undefined) warnings.push('TWILIO_ACCOUNT_SID not set');
    if (provider.twilio.authToken === undefined) warnings.push('TWILIO_AUTH_TOKEN not set');
    if (provider.twilio.whatsappFrom === undefined) warnings.push('TWILIO_WHATSAPP_FROM not set');
  } else if (provider.selector === 'meta') {
    if (provider.meta.phoneNumberId === undefined) warnings.push('WA_PHONE_NUMBER_ID not set');
    if (provider.meta.accessToken === undefined) warnings.push('WA_ACCESS_TOKEN not set');
  } else {
    warnings.push(`Unknown WA_PROVIDER: ${provider.selector} (use 'twilio' or 'meta')`);
  }

  return warnings;
};
