import { Kysely, Migrator, PostgresDialect } from 'kysely';
import { err, ok, type Result } from 'neverthrow';
import pg from 'pg';

import { messagingMigrationProvider } from './migrations.js';

import type { MessagingDatabase } from './messaging/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type MessagingDbClient = Kysely<MessagingDatabase>;

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the messaging database client
 */
export const initDatabase = (config: AppConfig): MessagingDbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for messaging database (DATABASE_URL)');
  }

  return createClient<MessagingDatabase>(database.url);
};

/**
 * Applies pending migrations. Returns the names applied in this run.
 */
export const migrateToLatest = async (db: MessagingDbClient): Promise<Result<string[], Error>> => {
  const migrator = new Migrator({ db, provider: messagingMigrationProvider });
  const { error, results } = await migrator.migrateToLatest();

  if (error !== undefined) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }

  const applied = (results ?? [])
    .filter((result) => result.status === 'Success')
    .map((result) => result.migrationName);

  return ok(applied);
};

// Re-export types
export type {
  Contacts,
  MessageAttempts,
  MessagingDatabase,
  Timestamp,
} from './messaging/types.js';
