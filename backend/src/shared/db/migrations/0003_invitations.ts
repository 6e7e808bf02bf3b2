/**
 * src/shared/db/migrations/0003_invitations.ts
 *
 * - One invitation per (event, user): the unique constraint backs the
 *   "already invited" conflict (insert uses ON CONFLICT DO NOTHING).
 * - Invitees list their invitations by user_id.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('invitations')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('event_id', 'uuid', (col) =>
      col.notNull().references('events.id').onDelete('cascade'),
    )
    .addColumn('user_id', 'uuid', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('invited_by_user_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('status', 'text', (col) =>
      col
        .notNull()
        .defaultTo('PENDING')
        .check(sql`status IN ('PENDING', 'ACCEPTED', 'DECLINED')`),
    )
    .addColumn('responded_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('invitations_event_id_user_id_key', ['event_id', 'user_id'])
    .execute();

  await db.schema
    .createIndex('invitations_user_id_idx')
    .on('invitations')
    .column('user_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('invitations').ifExists().execute();
}
