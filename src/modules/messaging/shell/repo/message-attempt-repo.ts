/**
 * Message Attempt Repository Implementation
 *
 * Kysely-based implementation. Status changes are single UPDATE statements
 * keyed by provider message id, so concurrent callbacks for the same message
 * cannot interleave. Only outbound rows take delivery statuses.
 */

import { sql, type Selectable } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  createDatabaseError,
  createDuplicateAttemptError,
  type AttemptWriteError,
  type DatabaseError,
} from '../../core/errors.js';
import { isCanonicalStatus } from '../../core/status-mapping.js';

import type {
  CreateMessageAttemptInput,
  MessageAttemptRepository,
  StatusCountRow,
  UpdateStatusOptions,
} from '../../core/ports.js';
import type { CanonicalStatus, MessageAttempt } from '../../core/types.js';
import type { MessageAttempts, MessagingDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MessageAttemptRepoConfig {
  db: MessagingDbClient;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps a database row to MessageAttempt.
 */
const mapRow = (row: Selectable<MessageAttempts>): MessageAttempt => ({
  id: row.id,
  groupId: row.group_id,
  contactId: row.contact_id,
  phone: row.phone,
  direction: row.direction,
  body: row.body,
  // Rows are only written through this module; queued is the column default
  status: isCanonicalStatus(row.status) ? row.status : 'queued',
  providerMessageId: row.provider_message_id,
  errorText: row.error_text,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error &&
  (('code' in error && error.code === '23505') ||
    error.message.includes('unique constraint') ||
    error.message.includes('duplicate key'));

const toDatabaseError = (error: unknown): DatabaseError =>
  createDatabaseError(error instanceof Error ? error.message : 'Unknown error');

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeMessageAttemptRepo = (
  config: MessageAttemptRepoConfig
): MessageAttemptRepository => {
  const { db, logger } = config;
  const log = logger.child({ repo: 'MessageAttemptRepo' });

  return {
    async createMessageAttempt(
      input: CreateMessageAttemptInput
    ): Promise<Result<MessageAttempt, AttemptWriteError>> {
      try {
        const row = await db
          .insertInto('message_attempts')
          .values({
            group_id: input.groupId,
            contact_id: input.contactId,
            phone: input.phone,
            direction: input.direction,
            body: input.body,
            status: input.status,
            provider_message_id: input.providerMessageId,
            error_text: input.errorText,
          })
          .returningAll()
          .executeTakeFirst();

        if (row === undefined) {
          return err(createDatabaseError('Insert returned no result'));
        }

        log.debug(
          { attemptId: row.id, phone: input.phone, status: input.status },
          'Message attempt created'
        );
        return ok(mapRow(row));
      } catch (error) {
        if (isUniqueViolation(error)) {
          log.warn({ providerMessageId: input.providerMessageId }, 'Duplicate provider message id');
          return err(createDuplicateAttemptError(input.providerMessageId));
        }

        log.error({ error, phone: input.phone }, 'Failed to create message attempt');
        return err(toDatabaseError(error));
      }
    },

    async updateStatusByProviderId(
      providerMessageId: string,
      status: CanonicalStatus,
      options?: UpdateStatusOptions
    ): Promise<Result<number, DatabaseError>> {
      const allowedCurrent = options?.allowedCurrent;

      if (providerMessageId === '' || allowedCurrent?.length === 0) {
        return ok(0);
      }

      try {
        let query = db
          .updateTable('message_attempts')
          .set({ status, updated_at: sql<Date>`now()` })
          .where('provider_message_id', '=', providerMessageId)
          .where('direction', '=', 'outbound');

        if (allowedCurrent !== undefined) {
          query = query.where('status', 'in', [...allowedCurrent]);
        }

        const result = await query.executeTakeFirst();
        const updated = Number(result.numUpdatedRows);

        log.debug({ providerMessageId, status, updated }, 'Status update complete');
        return ok(updated);
      } catch (error) {
        log.error({ error, providerMessageId }, 'Failed to update message status');
        return err(toDatabaseError(error));
      }
    },

    async findByProviderId(
      providerMessageId: string
    ): Promise<Result<MessageAttempt | null, DatabaseError>> {
      if (providerMessageId === '') {
        return ok(null);
      }

      try {
        const row = await db
          .selectFrom('message_attempts')
          .selectAll()
          .where('provider_message_id', '=', providerMessageId)
          .executeTakeFirst();

        return ok(row !== undefined ? mapRow(row) : null);
      } catch (error) {
        log.error({ error, providerMessageId }, 'Failed to find message attempt');
        return err(toDatabaseError(error));
      }
    },

    async countByStatus(filter: {
      groupId?: string;
    }): Promise<Result<StatusCountRow[], DatabaseError>> {
      try {
        let query = db
          .selectFrom('message_attempts')
          .select((eb) => ['direction', 'status', eb.fn.countAll<string>().as('count')])
          .groupBy(['direction', 'status']);

        if (filter.groupId !== undefined) {
          query = query.where('group_id', '=', filter.groupId);
        }

        const rows = await query.execute();

        return ok(
          rows.map((row) => ({
            direction: row.direction,
            status: row.status,
            count: Number(row.count),
          }))
        );
      } catch (error) {
        log.error({ error, groupId: filter.groupId }, 'Failed to count message attempts');
        return err(toDatabaseError(error));
      }
    },
  };
};
