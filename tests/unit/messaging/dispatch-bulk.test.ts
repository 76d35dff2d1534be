import { err, ok } from 'neverthrow';
import pinoLogger from 'pino';
import { describe, expect, it } from 'vitest';

import {
  createDatabaseError,
  createProviderRejection,
  createTransportError,
} from '@/modules/messaging/core/errors.js';
import { makeRateLimiter, type RateLimiter } from '@/modules/messaging/core/rate-limiter.js';
import {
  dispatchBulk,
  streamBulkDispatch,
  type DispatchBulkDeps,
} from '@/modules/messaging/core/usecases/dispatch-bulk.js';
import {
  makeUnconfiguredAdapter,
  resolveProviderSettings,
} from '@/modules/messaging/shell/providers/index.js';

import {
  makeFakeAttemptRepo,
  makeFakeClock,
  makeFakeContactDirectory,
  makeFakeProviderAdapter,
  type FakeAttemptRepo,
  type FakeClock,
  type FakeContactDirectory,
  type FakeProviderAdapter,
} from '../../fixtures/fakes.js';
import { makeTestConfig } from '../../fixtures/builders.js';

import type { DispatchStatus, Recipient } from '@/modules/messaging/core/types.js';

const logger = pinoLogger({ level: 'silent' });

const recipients = (count: number): Recipient[] =>
  Array.from({ length: count }, (_, i) => ({
    phone: `+1555000000${String(i + 1)}`,
    firstName: `User${String(i + 1)}`,
  }));

interface Harness {
  deps: DispatchBulkDeps;
  clock: FakeClock;
  provider: FakeProviderAdapter;
  attemptRepo: FakeAttemptRepo;
  contacts: FakeContactDirectory;
}

const makeHarness = (
  overrides: {
    provider?: FakeProviderAdapter;
    attemptRepo?: FakeAttemptRepo;
    contacts?: FakeContactDirectory;
    messagesPerSecond?: number;
  } = {}
): Harness => {
  const clock = makeFakeClock();
  const provider = overrides.provider ?? makeFakeProviderAdapter({ clock });
  const attemptRepo = overrides.attemptRepo ?? makeFakeAttemptRepo();
  const contacts = overrides.contacts ?? makeFakeContactDirectory();
  const rateLimiter = makeRateLimiter({
    messagesPerSecond: overrides.messagesPerSecond ?? 10,
    clock,
    logger,
  });

  return {
    deps: { provider, rateLimiter, attemptRepo, contacts, logger },
    clock,
    provider,
    attemptRepo,
    contacts,
  };
};

describe('dispatchBulk', () => {
  it('sends one rendered message per recipient in input order', async () => {
    const { deps, provider } = makeHarness();

    await dispatchBulk(deps, {
      recipients: [
        { phone: '+15550000001', firstName: 'Ana', lastName: 'Pop' },
        { phone: '+15550000002', name: 'Bob' },
      ],
      template: 'Hi {name}, reply STOP to {phone}',
    });

    expect(provider.calls.map((c) => [c.destination, c.body])).toEqual([
      ['+15550000001', 'Hi Ana Pop, reply STOP to +15550000001'],
      ['+15550000002', 'Hi Bob, reply STOP to +15550000002'],
    ]);
  });

  it('paces sends at the configured rate', async () => {
    const { deps, clock, provider } = makeHarness({ messagesPerSecond: 10 });

    await dispatchBulk(deps, { recipients: recipients(5), template: 'Hi {first_name}' });

    expect(provider.calls.map((c) => c.at)).toEqual([0, 100, 200, 300, 400]);
    expect(clock.now()).toBe(400);
  });

  it('shares the rate across concurrent dispatches', async () => {
    const clock = makeFakeClock();
    const rateLimiter = makeRateLimiter({ messagesPerSecond: 10, clock, logger });
    const provider = makeFakeProviderAdapter({ clock });
    const deps: DispatchBulkDeps = {
      provider,
      rateLimiter,
      attemptRepo: makeFakeAttemptRepo(),
      contacts: makeFakeContactDirectory(),
      logger,
    };

    const [first, second] = await Promise.all([
      dispatchBulk(deps, { recipients: recipients(3), template: 'a', groupId: 'g1' }),
      dispatchBulk(deps, { recipients: recipients(3), template: 'b', groupId: 'g2' }),
    ]);

    expect(first.succeeded).toBe(3);
    expect(second.succeeded).toBe(3);
    expect(provider.calls).toHaveLength(6);
    expect(clock.now()).toBe(500);
  });

  it('returns counts and per-recipient outcomes', async () => {
    const clock = makeFakeClock();
    const provider = makeFakeProviderAdapter({
      clock,
      respond: (_destination, call) =>
        call === 2
          ? err(createProviderRejection('twilio', 'Invalid To number', 400))
          : ok({ providerMessageId: `SM-${String(call)}` }),
    });
    const { deps } = makeHarness({ provider });

    const result = await dispatchBulk(deps, { recipients: recipients(3), template: 'Hi' });

    expect(result).toEqual({
      requested: 3,
      total: 3,
      succeeded: 2,
      failed: 1,
      cancelled: false,
      results: [
        {
          phone: '+15550000001',
          status: 'sent',
          providerMessageId: 'SM-1',
          error: '',
          attemptId: 'attempt-1',
        },
        {
          phone: '+15550000002',
          status: 'failed',
          providerMessageId: '',
          error: 'Invalid To number',
          attemptId: 'attempt-2',
        },
        {
          phone: '+15550000003',
          status: 'sent',
          providerMessageId: 'SM-3',
          error: '',
          attemptId: 'attempt-3',
        },
      ],
    });
    expect(result.succeeded + result.failed).toBe(result.total);
  });

  it('persists one attempt per recipient, including failures', async () => {
    const provider = makeFakeProviderAdapter({
      respond: () => err(createTransportError('meta', 'socket hang up')),
    });
    const { deps, attemptRepo } = makeHarness({ provider });

    await dispatchBulk(deps, {
      recipients: [{ phone: '+15550000001' }],
      template: 'Hello',
      groupId: 'campaign-7',
    });

    expect(attemptRepo.attempts).toHaveLength(1);
    expect(attemptRepo.attempts[0]).toMatchObject({
      groupId: 'campaign-7',
      contactId: null,
      phone: '+15550000001',
      direction: 'outbound',
      body: 'Hello',
      status: 'failed',
      providerMessageId: '',
      errorText: 'meta transport error: socket hang up',
    });
  });

  it('stores the body cut to 500 characters and sends it whole', async () => {
    const { deps, provider, attemptRepo } = makeHarness();
    const template = 'x'.repeat(600);

    await dispatchBulk(deps, { recipients: recipients(1), template });

    expect(provider.calls[0]?.body).toHaveLength(600);
    expect(attemptRepo.attempts[0]?.body).toHaveLength(500);
  });

  it('links attempts to known contacts', async () => {
    const contacts = makeFakeContactDirectory({
      contacts: [{ id: 'contact-ana', phone: '+15550000001', name: 'Ana' }],
    });
    const { deps, attemptRepo } = makeHarness({ contacts });

    await dispatchBulk(deps, {
      recipients: [
        { phone: '+15550000001' },
        { phone: '+15550000002', contactId: 'contact-explicit' },
        { phone: '+15550000003' },
      ],
      template: 'Hi',
    });

    expect(attemptRepo.attempts.map((a) => a.contactId)).toEqual([
      'contact-ana',
      'contact-explicit',
      null,
    ]);
    expect(contacts.lookups).toEqual(['+15550000001', '+15550000003']);
  });

  it('sends without a contact when the lookup fails', async () => {
    const contacts = makeFakeContactDirectory({ failWith: createDatabaseError('timeout') });
    const { deps, attemptRepo } = makeHarness({ contacts });

    const result = await dispatchBulk(deps, { recipients: recipients(2), template: 'Hi' });

    expect(result.succeeded).toBe(2);
    expect(attemptRepo.attempts.map((a) => a.contactId)).toEqual([null, null]);
  });

  it('keeps going when an attempt cannot be persisted', async () => {
    const attemptRepo = makeFakeAttemptRepo({
      failCreate: (input) =>
        input.phone === '+15550000001' ? createDatabaseError('connection reset') : undefined,
    });
    const { deps, provider } = makeHarness({ attemptRepo });

    const result = await dispatchBulk(deps, { recipients: recipients(2), template: 'Hi' });

    expect(provider.calls).toHaveLength(2);
    expect(result.succeeded).toBe(2);
    expect(result.results.map((r) => r.attemptId)).toEqual([null, 'attempt-1']);
  });

  it('reports progress after each recipient', async () => {
    const provider = makeFakeProviderAdapter({
      respond: (_destination, call) =>
        call === 1
          ? err(createProviderRejection('meta', 'Recipient not on WhatsApp', 400))
          : ok({ providerMessageId: 'wamid.2' }),
    });
    const { deps } = makeHarness({ provider });
    const progress: [number, number, DispatchStatus][] = [];

    await dispatchBulk(deps, {
      recipients: recipients(2),
      template: 'Hi',
      onProgress: (current, total, status) => progress.push([current, total, status]),
    });

    expect(progress).toEqual([
      [1, 2, 'failed'],
      [2, 2, 'sent'],
    ]);
  });

  it('stops between recipients when cancelled', async () => {
    const { deps, provider, attemptRepo } = makeHarness();
    const controller = new AbortController();

    const result = await dispatchBulk(deps, {
      recipients: recipients(5),
      template: 'Hi',
      signal: controller.signal,
      onProgress: (current) => {
        if (current === 2) controller.abort();
      },
    });

    expect(provider.calls).toHaveLength(2);
    expect(attemptRepo.attempts).toHaveLength(2);
    expect(result).toMatchObject({
      requested: 5,
      total: 2,
      succeeded: 2,
      failed: 0,
      cancelled: true,
    });
  });

  it('does not send when cancelled while waiting for a permit', async () => {
    const controller = new AbortController();
    let acquired = 0;
    const rateLimiter: RateLimiter = {
      intervalMs: 100,
      acquire: () => {
        acquired += 1;
        if (acquired === 2) controller.abort();
        return Promise.resolve();
      },
    };
    const { deps, provider } = makeHarness();

    const result = await dispatchBulk(
      { ...deps, rateLimiter },
      { recipients: recipients(3), template: 'Hi', signal: controller.signal }
    );

    expect(provider.calls).toHaveLength(1);
    expect(result.total).toBe(1);
    expect(result.cancelled).toBe(true);
  });

  it('does nothing for an already cancelled signal', async () => {
    const { deps, provider } = makeHarness();

    const result = await dispatchBulk(deps, {
      recipients: recipients(2),
      template: 'Hi',
      signal: AbortSignal.abort(),
    });

    expect(provider.calls).toEqual([]);
    expect(result).toEqual({
      requested: 2,
      total: 0,
      succeeded: 0,
      failed: 0,
      cancelled: true,
      results: [],
    });
  });

  it('returns an empty result for no recipients', async () => {
    const { deps } = makeHarness();

    const result = await dispatchBulk(deps, { recipients: [], template: 'Hi' });

    expect(result).toEqual({
      requested: 0,
      total: 0,
      succeeded: 0,
      failed: 0,
      cancelled: false,
      results: [],
    });
  });

  it('fails every recipient when the provider is not configured', async () => {
    const settings = resolveProviderSettings(
      makeTestConfig({ WA_PROVIDER: 'telegram' }).provider
    );
    expect(settings.isErr()).toBe(true);
    if (!settings.isErr()) return;

    const provider = makeUnconfiguredAdapter(settings.error, logger);
    const { deps, attemptRepo } = makeHarness();

    const result = await dispatchBulk(
      { ...deps, provider },
      { recipients: recipients(2), template: 'Hi' }
    );

    expect(result.failed).toBe(2);
    expect(result.results[0]?.error).toBe(
      "Unknown provider 'telegram' (expected 'twilio' or 'meta')"
    );
    expect(attemptRepo.attempts.map((a) => a.status)).toEqual(['failed', 'failed']);
  });
});

describe('streamBulkDispatch', () => {
  it('yields one event per recipient and returns the aggregate', async () => {
    const { deps } = makeHarness();
    const stream = streamBulkDispatch(deps, { recipients: recipients(2), template: 'Hi' });

    const first = await stream.next();
    const second = await stream.next();
    const last = await stream.next();

    expect(first).toEqual({
      done: false,
      value: {
        current: 1,
        total: 2,
        status: 'sent',
        phone: '+15550000001',
        providerMessageId: 'SM-1',
        error: '',
      },
    });
    expect(second.done).toBe(false);
    expect(last.done).toBe(true);
    if (last.done === true) {
      expect(last.value.succeeded).toBe(2);
    }
  });

  it('persists a submitted recipient before yielding it', async () => {
    const { deps, attemptRepo } = makeHarness();
    const stream = streamBulkDispatch(deps, { recipients: recipients(3), template: 'Hi' });

    await stream.next();

    expect(attemptRepo.attempts).toHaveLength(1);
    expect(attemptRepo.attempts[0]?.providerMessageId).toBe('SM-1');
  });
});
