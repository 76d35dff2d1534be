import { describe, expect, it } from 'vitest';

import {
  parseMetaWebhook,
  parseTwilioInboundForm,
  parseTwilioStatusForm,
} from '@/modules/messaging/core/callback-payloads.js';

const metaPayload = (value: Record<string, unknown>) => ({
  object: 'whatsapp_business_account',
  entry: [{ id: 'waba-1', changes: [{ field: 'messages', value }] }],
});

describe('parseMetaWebhook', () => {
  it('extracts status callbacks', () => {
    const parsed = parseMetaWebhook(
      metaPayload({
        statuses: [
          { id: 'wamid.A', status: 'delivered', timestamp: '1700000000' },
          { id: 'wamid.B', status: 'read' },
        ],
      })
    );

    expect(parsed.statuses).toEqual([
      { provider: 'meta', providerMessageId: 'wamid.A', rawStatus: 'delivered' },
      { provider: 'meta', providerMessageId: 'wamid.B', rawStatus: 'read' },
    ]);
    expect(parsed.messages).toEqual([]);
  });

  it('extracts text messages with the sender profile name', () => {
    const parsed = parseMetaWebhook(
      metaPayload({
        contacts: [{ profile: { name: 'Ana' }, wa_id: '40700000001' }],
        messages: [
          { id: 'wamid.IN1', from: '40700000001', type: 'text', text: { body: 'hello' } },
        ],
      })
    );

    expect(parsed.messages).toEqual([
      {
        provider: 'meta',
        providerMessageId: 'wamid.IN1',
        phone: '+40700000001',
        name: 'Ana',
        body: 'hello',
      },
    ]);
  });

  it('keeps a sender that already has a leading plus', () => {
    const parsed = parseMetaWebhook(
      metaPayload({ messages: [{ from: '+40700000001', text: { body: 'hi' } }] })
    );

    expect(parsed.messages.map((m) => m.phone)).toEqual(['+40700000001']);
    expect(parsed.messages.map((m) => m.providerMessageId)).toEqual(['']);
  });

  it('uses the reply id of interactive messages', () => {
    const parsed = parseMetaWebhook(
      metaPayload({
        messages: [
          { from: '1', interactive: { list_reply: { id: 'menu_prices', title: 'Prices' } } },
          { from: '2', interactive: { button_reply: { id: 'yes', title: 'Yes' } } },
        ],
      })
    );

    expect(parsed.messages.map((m) => m.body)).toEqual(['menu_prices', 'yes']);
    expect(parsed.messages.map((m) => m.name)).toEqual(['', '']);
  });

  it('skips messages without text', () => {
    const parsed = parseMetaWebhook(
      metaPayload({ messages: [{ from: '1', type: 'image', image: { id: 'media-1' } }] })
    );

    expect(parsed.messages).toEqual([]);
  });

  it('skips malformed elements and keeps their siblings', () => {
    const parsed = parseMetaWebhook({
      entry: [
        'not-an-entry',
        {
          changes: [
            { value: 'not-an-object' },
            { value: { statuses: [{ status: 'sent' }, { id: 'wamid.C', status: 'sent' }] } },
          ],
        },
      ],
    });

    expect(parsed.statuses).toEqual([
      { provider: 'meta', providerMessageId: 'wamid.C', rawStatus: 'sent' },
    ]);
  });

  it.each([null, 'text', 42, {}, { entry: 'x' }])('returns nothing for %s', (payload) => {
    expect(parseMetaWebhook(payload)).toEqual({ statuses: [], messages: [] });
  });
});

describe('parseTwilioStatusForm', () => {
  it('reads MessageSid and MessageStatus', () => {
    expect(
      parseTwilioStatusForm({ MessageSid: 'SM1', MessageStatus: 'delivered', AccountSid: 'AC1' })
    ).toEqual({ provider: 'twilio', providerMessageId: 'SM1', rawStatus: 'delivered' });
  });

  it('returns null when a field is missing', () => {
    expect(parseTwilioStatusForm({ MessageSid: 'SM1' })).toBeNull();
    expect(parseTwilioStatusForm({ MessageStatus: 'sent' })).toBeNull();
    expect(parseTwilioStatusForm(undefined)).toBeNull();
  });
});

describe('parseTwilioInboundForm', () => {
  it('strips the channel prefix and trims the body', () => {
    expect(
      parseTwilioInboundForm({
        MessageSid: 'SM-in-1',
        From: 'whatsapp:+40700000001',
        Body: '  hi there \n',
        ProfileName: 'Ana',
      })
    ).toEqual({
      provider: 'twilio',
      providerMessageId: 'SM-in-1',
      phone: '+40700000001',
      name: 'Ana',
      body: 'hi there',
    });
  });

  it('defaults missing message id and name to empty', () => {
    expect(parseTwilioInboundForm({ From: '+1555', Body: 'hi' })).toEqual({
      provider: 'twilio',
      providerMessageId: '',
      phone: '+1555',
      name: '',
      body: 'hi',
    });
  });

  it('returns null without text', () => {
    expect(parseTwilioInboundForm({ From: '+1555' })).toBeNull();
    expect(parseTwilioInboundForm({ From: '+1555', Body: '   ' })).toBeNull();
  });

  it('returns null without a sender', () => {
    expect(parseTwilioInboundForm({ Body: 'hi' })).toBeNull();
  });
});
