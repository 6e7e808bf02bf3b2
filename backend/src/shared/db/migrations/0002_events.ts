/**
 * src/shared/db/migrations/0002_events.ts
 *
 * - name + start_at are NOT NULL: a persisted event always has both.
 * - end_at is optional but may never precede start_at (CHECK mirrors the model rule).
 * - Events are listed per owner ordered by start time.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('events')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('owner_id', 'uuid', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('start_at', 'timestamptz', (col) => col.notNull())
    .addColumn('end_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint('events_end_after_start', sql`end_at IS NULL OR end_at >= start_at`)
    .execute();

  await db.schema
    .createIndex('events_owner_id_start_at_idx')
    .on('events')
    .columns(['owner_id', 'start_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('events').ifExists().execute();
}
