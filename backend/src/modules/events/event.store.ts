/**
 * backend/src/modules/events/event.store.ts
 *
 * WHY:
 * - Persistence collaborator for events. Services depend on this interface only.
 *
 * RULES:
 * - No AppError, no policies.
 * - insertEvent receives a NewEvent (already validated by event.model).
 *   The DB constraints still apply; a violation surfaces as a driver error (500).
 */

import type { Event, NewEvent } from './event.types';

export interface EventStore {
  insertEvent(params: NewEvent): Promise<Event>;
  findEventById(eventId: string): Promise<Event | undefined>;

  /** Ordered by startAt ascending. */
  listEventsByOwner(ownerId: string): Promise<Event[]>;
}
