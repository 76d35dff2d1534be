/**
 * Contact Repository Implementation
 *
 * Phone-keyed lookups and upserts against the contacts table.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';

import type { ContactDirectory } from '../../core/ports.js';
import type { MessagingDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

export interface ContactRepoConfig {
  db: MessagingDbClient;
  logger: Logger;
}

export const makeContactRepo = (config: ContactRepoConfig): ContactDirectory => {
  const { db, logger } = config;
  const log = logger.child({ repo: 'ContactRepo' });

  return {
    async lookupByPhone(phone: string): Promise<Result<string | null, DatabaseError>> {
      try {
        const row = await db
          .selectFrom('contacts')
          .select('id')
          .where('phone', '=', phone)
          .executeTakeFirst();

        return ok(row?.id ?? null);
      } catch (error) {
        log.error({ error, phone }, 'Failed to look up contact');
        return err(createDatabaseError(error instanceof Error ? error.message : 'Unknown error'));
      }
    },

    async upsert(contact: { phone: string; name: string }): Promise<Result<string, DatabaseError>> {
      try {
        // An empty incoming name keeps the stored one
        const row = await db
          .insertInto('contacts')
          .values({ phone: contact.phone, name: contact.name })
          .onConflict((oc) =>
            oc.column('phone').doUpdateSet({
              name: sql<string>`CASE WHEN excluded.name = '' THEN contacts.name ELSE excluded.name END`,
              updated_at: sql<Date>`now()`,
            })
          )
          .returning('id')
          .executeTakeFirst();

        if (row === undefined) {
          return err(createDatabaseError('Upsert returned no result'));
        }

        log.debug({ contactId: row.id, phone: contact.phone }, 'Contact upserted');
        return ok(row.id);
      } catch (error) {
        log.error({ error, phone: contact.phone }, 'Failed to upsert contact');
        return err(createDatabaseError(error instanceof Error ? error.message : 'Unknown error'));
      }
    },
  };
};
