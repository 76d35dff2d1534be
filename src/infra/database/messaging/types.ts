import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;
// Database-defaulted timestamp: optional on insert (Generated<Timestamp> would nest ColumnType)
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

// Contacts Table
export interface Contacts {
  id: Generated<string>; // UUID
  phone: string;
  name: Generated<string>;
  subscribed: Generated<boolean>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

// Message Attempts Table
// One row per outbound send or inbound message. provider_message_id is the
// reconciliation key; a partial unique index covers non-empty values.
export interface MessageAttempts {
  id: Generated<string>; // UUID
  group_id: string | null;
  contact_id: string | null;
  phone: string;
  direction: 'outbound' | 'inbound';
  body: string;
  status: Generated<string>;
  provider_message_id: Generated<string>;
  error_text: Generated<string>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

// Database Schema Interface
// Keys are lowercase/snake_case to match PostgreSQL identifier folding.
export interface MessagingDatabase {
  contacts: Contacts;
  message_attempts: MessageAttempts;
}
