/**
 * Messaging Module - Provider Callback Payloads
 *
 * Parses the providers' webhook bodies into status callbacks and inbound
 * messages. Malformed entries are skipped one by one; a payload never fails
 * as a whole.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import type { InboundMessage, StatusCallback } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Meta Cloud API Schemas
// ─────────────────────────────────────────────────────────────────────────────

// Containers are checked shallowly; elements are validated individually so
// one bad element does not discard its siblings.
const MetaWebhookSchema = Type.Object({
  entry: Type.Array(Type.Unknown()),
});

const MetaEntrySchema = Type.Object({
  changes: Type.Array(Type.Unknown()),
});

const MetaChangeSchema = Type.Object({
  value: Type.Object({
    statuses: Type.Optional(Type.Array(Type.Unknown())),
    messages: Type.Optional(Type.Array(Type.Unknown())),
    contacts: Type.Optional(Type.Array(Type.Unknown())),
  }),
});

const MetaStatusSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  status: Type.String(),
});

const MetaContactSchema = Type.Object({
  profile: Type.Object({
    name: Type.String(),
  }),
});

const ReplySchema = Type.Object({ id: Type.String() });

const MetaMessageSchema = Type.Object({
  id: Type.Optional(Type.String()),
  from: Type.String({ minLength: 1 }),
  text: Type.Optional(Type.Object({ body: Type.String() })),
  interactive: Type.Optional(
    Type.Object({
      list_reply: Type.Optional(ReplySchema),
      button_reply: Type.Optional(ReplySchema),
    })
  ),
});

type MetaMessage = Static<typeof MetaMessageSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ParsedCallbacks {
  statuses: StatusCallback[];
  messages: InboundMessage[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const messageText = (message: MetaMessage): string | null => {
  if (message.text !== undefined) {
    return message.text.body;
  }
  const reply = message.interactive?.list_reply ?? message.interactive?.button_reply;
  return reply !== undefined ? reply.id : null;
};

const firstContactName = (contacts: unknown[] | undefined): string => {
  const first = contacts?.[0];
  return Value.Check(MetaContactSchema, first) ? first.profile.name : '';
};

const formString = (form: Record<string, unknown>, key: string): string => {
  const value = form[key];
  return typeof value === 'string' ? value : '';
};

const withPlus = (phone: string): string => (phone.startsWith('+') ? phone : `+${phone}`);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ─────────────────────────────────────────────────────────────────────────────
// Parsers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses a Meta webhook body (`entry[].changes[].value`).
 * Senders usually come without a leading '+'; it is added when missing.
 */
export const parseMetaWebhook = (payload: unknown): ParsedCallbacks => {
  const parsed: ParsedCallbacks = { statuses: [], messages: [] };

  if (!Value.Check(MetaWebhookSchema, payload)) {
    return parsed;
  }

  for (const entry of payload.entry) {
    if (!Value.Check(MetaEntrySchema, entry)) continue;

    for (const change of entry.changes) {
      if (!Value.Check(MetaChangeSchema, change)) continue;
      const { value } = change;

      for (const status of value.statuses ?? []) {
        if (!Value.Check(MetaStatusSchema, status)) continue;
        parsed.statuses.push({
          provider: 'meta',
          providerMessageId: status.id,
          rawStatus: status.status,
        });
      }

      const senderName = firstContactName(value.contacts);

      for (const message of value.messages ?? []) {
        if (!Value.Check(MetaMessageSchema, message)) continue;
        const body = messageText(message);
        if (body === null) continue;
        parsed.messages.push({
          provider: 'meta',
          providerMessageId: message.id ?? '',
          phone: withPlus(message.from),
          name: senderName,
          body,
        });
      }
    }
  }

  return parsed;
};

/**
 * Parses a Twilio status callback form (`MessageSid`, `MessageStatus`).
 * Returns null when either field is missing.
 */
export const parseTwilioStatusForm = (form: unknown): StatusCallback | null => {
  if (!isRecord(form)) return null;

  const providerMessageId = formString(form, 'MessageSid');
  const rawStatus = formString(form, 'MessageStatus');
  if (providerMessageId === '' || rawStatus === '') return null;

  return { provider: 'twilio', providerMessageId, rawStatus };
};

/**
 * Parses a Twilio inbound message form (`MessageSid`, `From`, `Body`, `ProfileName`).
 * Returns null when the sender or the text is missing.
 */
export const parseTwilioInboundForm = (form: unknown): InboundMessage | null => {
  if (!isRecord(form)) return null;

  const phone = formString(form, 'From').replace(/^whatsapp:/, '');
  const body = formString(form, 'Body').trim();
  if (phone === '' || body === '') return null;

  return {
    provider: 'twilio',
    providerMessageId: formString(form, 'MessageSid'),
    phone,
    name: formString(form, 'ProfileName'),
    body,
  };
};
