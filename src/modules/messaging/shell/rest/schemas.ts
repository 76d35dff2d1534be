/**
 * Messaging REST Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Webhooks
// ─────────────────────────────────────────────────────────────────────────────

// A repeated key arrives as an array; the handler treats it as a mismatch
const QueryValue = Type.Union([Type.String(), Type.Array(Type.String())]);

export const VerifyQuerySchema = Type.Object({
  'hub.mode': Type.Optional(QueryValue),
  'hub.verify_token': Type.Optional(QueryValue),
  'hub.challenge': Type.Optional(QueryValue),
});

export type VerifyQuery = Static<typeof VerifyQuerySchema>;

export const AckResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

// ─────────────────────────────────────────────────────────────────────────────
// Dispatch
// ─────────────────────────────────────────────────────────────────────────────

export const RecipientSchema = Type.Object({
  phone: Type.String({ minLength: 1 }),
  firstName: Type.Optional(Type.String()),
  lastName: Type.Optional(Type.String()),
  name: Type.Optional(Type.String()),
  contactId: Type.Optional(Type.String()),
});

export const DispatchRequestSchema = Type.Object({
  recipients: Type.Array(RecipientSchema, { maxItems: 10000 }),
  template: Type.String({ minLength: 1 }),
  groupId: Type.Optional(Type.String({ minLength: 1 })),
});

export type DispatchRequest = Static<typeof DispatchRequestSchema>;

const DispatchStatusSchema = Type.Union([Type.Literal('sent'), Type.Literal('failed')]);

export const BulkSendResultSchema = Type.Object({
  requested: Type.Number(),
  total: Type.Number(),
  succeeded: Type.Number(),
  failed: Type.Number(),
  cancelled: Type.Boolean(),
  results: Type.Array(
    Type.Object({
      phone: Type.String(),
      status: DispatchStatusSchema,
      providerMessageId: Type.String(),
      error: Type.String(),
      attemptId: Type.Union([Type.String(), Type.Null()]),
    })
  ),
});

// ─────────────────────────────────────────────────────────────────────────────
// Stats
// ─────────────────────────────────────────────────────────────────────────────

export const StatsQuerySchema = Type.Object({
  groupId: Type.Optional(Type.String({ minLength: 1 })),
});

export type StatsQuery = Static<typeof StatsQuerySchema>;

export const MessageStatsSchema = Type.Object({
  total: Type.Number(),
  queued: Type.Number(),
  sent: Type.Number(),
  delivered: Type.Number(),
  read: Type.Number(),
  failed: Type.Number(),
  inbound: Type.Number(),
});

export const ErrorResponseSchema = Type.Object({
  error: Type.String(),
});
