/**
 * backend/src/modules/events/event.serializers.ts
 */

import type { Event } from './event.types';

export type EventResponse = {
  id: string;
  ownerId: string;
  name: string;
  startAt: string;
  endAt: string | null;
  createdAt: string;
};

export function serializeEvent(event: Event): EventResponse {
  return {
    id: event.id,
    ownerId: event.ownerId,
    name: event.name,
    startAt: event.startAt.toISOString(),
    endAt: event.endAt ? event.endAt.toISOString() : null,
    createdAt: event.createdAt.toISOString(),
  };
}
