/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table interfaces (snake_case, exactly as the columns exist in Postgres).
 * - Only Kysely stores (modules/x/dal/kysely-*.store.ts) import these;
 *   everything else works with the camelCase domain types.
 *
 * RULES:
 * - Keep aligned with migrations/ (one edit here per schema migration).
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;
type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: Generated<string>;
  email: string;
  name: string;
  role: 'PARENT' | 'CHILD';
  password_hash: string;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface EventsTable {
  id: Generated<string>;
  owner_id: string;
  name: string;
  start_at: Timestamp;
  end_at: Timestamp | null;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface InvitationsTable {
  id: Generated<string>;
  event_id: string;
  user_id: string;
  invited_by_user_id: string;
  status: 'PENDING' | 'ACCEPTED' | 'DECLINED';
  responded_at: Timestamp | null;
  created_at: GeneratedTimestamp;
}

export interface DB {
  users: UsersTable;
  events: EventsTable;
  invitations: InvitationsTable;
}
