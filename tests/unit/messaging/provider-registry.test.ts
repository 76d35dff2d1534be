import { ok } from 'neverthrow';
import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import {
  makeProviderAdapter,
  resolveProviderSettings,
  type MetaSettings,
  type TwilioSettings,
} from '@/modules/messaging/shell/providers/index.js';

import { makeFakeFetch, makeFakeTwilioMessages } from '../../fixtures/fakes.js';
import { makeTestConfig } from '../../fixtures/builders.js';

const logger = pinoLogger({ level: 'silent' });

describe('resolveProviderSettings', () => {
  it('resolves a configured Twilio provider', () => {
    const result = resolveProviderSettings(
      makeTestConfig({ TWILIO_STATUS_CALLBACK_URL: 'https://relay.example.test/twilio-status' })
        .provider
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        kind: 'twilio',
        accountSid: 'ACtest',
        authToken: 'test-secret',
        from: 'whatsapp:+14155238886',
        statusCallbackUrl: 'https://relay.example.test/twilio-status',
      });
    }
  });

  it('resolves a configured Meta provider', () => {
    const result = resolveProviderSettings(
      makeTestConfig({
        WA_PROVIDER: 'META',
        WA_PHONE_NUMBER_ID: '1234567890',
        WA_ACCESS_TOKEN: 'test-token',
      }).provider
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({
        kind: 'meta',
        phoneNumberId: '1234567890',
        accessToken: 'test-token',
        apiVersion: 'v21.0',
      });
    }
  });

  it('names every missing Twilio credential', () => {
    const result = resolveProviderSettings(
      makeTestConfig({ TWILIO_AUTH_TOKEN: '', TWILIO_WHATSAPP_FROM: '  ' }).provider
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'ConfigurationError',
        message:
          'twilio provider is not configured: missing TWILIO_AUTH_TOKEN, TWILIO_WHATSAPP_FROM',
      });
    }
  });

  it('names every missing Meta credential', () => {
    const result = resolveProviderSettings(makeTestConfig({ WA_PROVIDER: 'meta' }).provider);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        'meta provider is not configured: missing WA_PHONE_NUMBER_ID, WA_ACCESS_TOKEN'
      );
    }
  });

  it('rejects an unknown selector', () => {
    const result = resolveProviderSettings(makeTestConfig({ WA_PROVIDER: 'sms' }).provider);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("Unknown provider 'sms' (expected 'twilio' or 'meta')");
    }
  });
});

describe('makeProviderAdapter', () => {
  it('builds the Twilio adapter over the messages resource for the settings', async () => {
    const messages = makeFakeTwilioMessages({ sid: 'SM-abc' });
    const received: TwilioSettings[] = [];
    const adapter = makeProviderAdapter(resolveProviderSettings(makeTestConfig().provider), {
      logger,
      twilioMessages: (settings) => {
        received.push(settings);
        return messages;
      },
    });

    const result = await adapter.send('+15550000001', 'Hi');

    expect(adapter.provider).toBe('twilio');
    expect(received.map((s) => s.accountSid)).toEqual(['ACtest']);
    expect(result.isOk() && result.value.providerMessageId).toBe('SM-abc');
    expect(messages.created[0]?.from).toBe('whatsapp:+14155238886');
  });

  it('builds the Meta adapter over the given fetch', async () => {
    const fake = makeFakeFetch({ status: 200, body: '{"messages":[{"id":"wamid.1"}]}' });
    const settings: MetaSettings = {
      kind: 'meta',
      phoneNumberId: '1234567890',
      accessToken: 'test-token',
      apiVersion: 'v20.0',
    };
    const adapter = makeProviderAdapter(ok(settings), { logger, fetch: fake.fetch });

    const result = await adapter.send('+15550000001', 'Hi');

    expect(adapter.provider).toBe('meta');
    expect(result.isOk() && result.value.providerMessageId).toBe('wamid.1');
    expect(fake.calls[0]?.url).toBe('https://graph.facebook.com/v20.0/1234567890/messages');
  });

  it('rejects every send when the configuration is unusable', async () => {
    const adapter = makeProviderAdapter(
      resolveProviderSettings(makeTestConfig({ TWILIO_ACCOUNT_SID: '' }).provider),
      { logger }
    );

    const result = await adapter.send('+15550000001', 'Hi');

    expect(adapter.provider).toBeNull();
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'ConfigurationError',
        message: 'twilio provider is not configured: missing TWILIO_ACCOUNT_SID',
      });
    }
  });

  it('degrades to a rejecting adapter when the Twilio client refuses the credentials', async () => {
    const adapter = makeProviderAdapter(
      resolveProviderSettings(makeTestConfig({ TWILIO_ACCOUNT_SID: 'my-sid' }).provider),
      { logger }
    );

    const result = await adapter.send('+15550000001', 'Hi');

    expect(adapter.provider).toBeNull();
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('ConfigurationError');
      expect(result.error.message).toMatch(
        /^twilio provider is not configured: .*accountSid must start with AC/
      );
    }
  });
});
