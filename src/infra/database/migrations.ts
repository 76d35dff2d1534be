/**
 * Schema migrations for the messaging database.
 *
 * Migrations live in code so both entry points (HTTP server and the
 * send-broadcast script) can bring the schema up without shipping SQL files.
 */

import { sql, type Kysely, type Migration, type MigrationProvider } from 'kysely';

// ─────────────────────────────────────────────────────────────────────────────
// Migrations
// ─────────────────────────────────────────────────────────────────────────────

// Migrations run against an untyped handle: the schema they build is what the
// typed MessagingDatabase interface describes afterwards.
const createContactsAndAttempts: Migration = {
  async up(db: Kysely<unknown>): Promise<void> {
    await db.schema
      .createTable('contacts')
      .ifNotExists()
      .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
      .addColumn('phone', 'text', (col) => col.notNull().unique())
      .addColumn('name', 'text', (col) => col.notNull().defaultTo(''))
      .addColumn('subscribed', 'boolean', (col) => col.notNull().defaultTo(true))
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();

    await db.schema
      .createTable('message_attempts')
      .ifNotExists()
      .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
      .addColumn('group_id', 'text')
      .addColumn('contact_id', 'uuid', (col) => col.references('contacts.id').onDelete('set null'))
      .addColumn('phone', 'text', (col) => col.notNull())
      .addColumn('direction', 'text', (col) =>
        col.notNull().check(sql`direction IN ('outbound', 'inbound')`)
      )
      .addColumn('body', 'text', (col) => col.notNull())
      .addColumn('status', 'text', (col) => col.notNull().defaultTo('queued'))
      .addColumn('provider_message_id', 'text', (col) => col.notNull().defaultTo(''))
      .addColumn('error_text', 'text', (col) => col.notNull().defaultTo(''))
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();

    await db.schema
      .createIndex('message_attempts_provider_message_id_key')
      .ifNotExists()
      .on('message_attempts')
      .column('provider_message_id')
      .unique()
      .where(sql<boolean>`provider_message_id <> ''`)
      .execute();

    await db.schema
      .createIndex('message_attempts_group_id_idx')
      .ifNotExists()
      .on('message_attempts')
      .column('group_id')
      .execute();
  },

  async down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('message_attempts').ifExists().execute();
    await db.schema.dropTable('contacts').ifExists().execute();
  },
};

const migrations: Record<string, Migration> = {
  '0001_create_contacts_and_message_attempts': createContactsAndAttempts,
};

/**
 * Supplies the in-code migrations to Kysely's Migrator.
 */
export const messagingMigrationProvider: MigrationProvider = {
  getMigrations: () => Promise.resolve(migrations),
};
