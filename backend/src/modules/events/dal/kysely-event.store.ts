/**
 * backend/src/modules/events/dal/kysely-event.store.ts
 *
 * WHY:
 * - Postgres implementation of EventStore (Kysely).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here: each write is a single statement.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { EventsTable } from '../../../shared/db/schema';
import type { EventStore } from '../event.store';
import type { Event, NewEvent } from '../event.types';

type EventRow = Selectable<EventsTable>;

function toEvent(row: EventRow): Event {
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    startAt: row.start_at,
    endAt: row.end_at ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyEventStore implements EventStore {
  constructor(private readonly db: DbExecutor) {}

  async insertEvent(params: NewEvent): Promise<Event> {
    const row = await this.db
      .insertInto('events')
      .values({
        owner_id: params.ownerId,
        name: params.name,
        start_at: params.startAt,
        end_at: params.endAt,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toEvent(row);
  }

  async findEventById(eventId: string): Promise<Event | undefined> {
    const row = await this.db
      .selectFrom('events')
      .selectAll()
      .where('id', '=', eventId)
      .executeTakeFirst();

    return row ? toEvent(row) : undefined;
  }

  async listEventsByOwner(ownerId: string): Promise<Event[]> {
    const rows = await this.db
      .selectFrom('events')
      .selectAll()
      .where('owner_id', '=', ownerId)
      .orderBy('start_at', 'asc')
      .execute();

    return rows.map(toEvent);
  }
}
