/**
 * backend/src/modules/events/index.ts
 *
 * Public surface of the events module.
 */

export type { Event, EventCandidate, NewEvent } from './event.types';
export type { EventStore } from './event.store';
export { KyselyEventStore } from './dal/kysely-event.store';
export { InMemEventStore } from './dal/inmem-event.store';
export { EventErrors } from './event.errors';
export { validateEvent, EVENT_NAME_MAX_LENGTH } from './event.model';
export { serializeEvent, type EventResponse } from './event.serializers';
export { CreateEventService } from './services/create-event.service';
export { GetEventService } from './services/get-event.service';
export { ListEventsService } from './services/list-events.service';
export { createEventModule, type EventModule } from './event.module';
