/**
 * backend/src/modules/events/services/list-events.service.ts
 *
 * Events owned by the actor, soonest first.
 */

import { ApplicationService } from '../../../shared/service/application-service';
import type { EventStore } from '../event.store';
import type { Event } from '../event.types';

export type ListEventsDeps = {
  eventStore: EventStore;
};

export type ListEventsInputs = {
  actorId: string;
};

export class ListEventsService extends ApplicationService<ListEventsDeps, ListEventsInputs, Event[]> {
  async call(): Promise<Event[]> {
    return this.deps.eventStore.listEventsByOwner(this.inputs.actorId);
  }
}
