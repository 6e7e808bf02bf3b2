/**
 * backend/src/modules/events/dal/inmem-event.store.ts
 *
 * WHY:
 * - Lets tests and PERSISTENCE=memory runs work without Postgres.
 * - Returns copies so callers can't mutate stored rows.
 */

import { randomUUID } from 'node:crypto';
import type { EventStore } from '../event.store';
import type { Event, NewEvent } from '../event.types';

export class InMemEventStore implements EventStore {
  private readonly rows = new Map<string, Event>();

  insertEvent(params: NewEvent): Promise<Event> {
    const now = new Date();
    const event: Event = {
      id: randomUUID(),
      ownerId: params.ownerId,
      name: params.name,
      startAt: params.startAt,
      endAt: params.endAt,
      createdAt: now,
      updatedAt: now,
    };

    this.rows.set(event.id, event);
    return Promise.resolve({ ...event });
  }

  findEventById(eventId: string): Promise<Event | undefined> {
    const event = this.rows.get(eventId);
    return Promise.resolve(event ? { ...event } : undefined);
  }

  listEventsByOwner(ownerId: string): Promise<Event[]> {
    const events = [...this.rows.values()]
      .filter((e) => e.ownerId === ownerId)
      .sort((a, b) => a.startAt.getTime() - b.startAt.getTime())
      .map((e) => ({ ...e }));

    return Promise.resolve(events);
  }
}
