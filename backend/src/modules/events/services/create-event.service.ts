/**
 * backend/src/modules/events/services/create-event.service.ts
 *
 * WHY:
 * - One business transaction: a parent schedules a family event.
 *
 * STEPS (in order, each runs at most once):
 * 1) authorize: actor must exist and be a PARENT          -> FORBIDDEN
 * 2) build:     candidate from permitted params, owned by the actor
 * 3) persist:   model rules, then insert                   -> VALIDATION_ERROR
 * 4) dispatch:  enqueue events.event-created (best-effort, see below)
 *
 * DISPATCH FAILURE POLICY:
 * - The event is already committed when dispatch runs. A failing queue is logged
 *   with the event id and does NOT fail the call or remove the event.
 */

import { ApplicationService } from '../../../shared/service/application-service';
import type { Logger } from '../../../shared/logger/logger';
import { errorFields } from '../../../shared/logger/logger';
import type { Queue } from '../../../shared/messaging/queue';

import type { User, UserStore } from '../../users';
import { assertActorExists } from '../../users';

import type { EventStore } from '../event.store';
import type { Event, EventCandidate } from '../event.types';
import { validateEvent } from '../event.model';
import { assertCanCreateEvents } from '../policies/event-access.policy';

const FLOW = 'events.create';

export type CreateEventDeps = {
  userStore: UserStore;
  eventStore: EventStore;
  queue: Queue;
  logger: Logger;
};

/** Permitted parameters (see event.schemas.ts). */
export type CreateEventParams = {
  name?: string;
  startAt?: Date;
  endAt?: Date | null;
};

export type CreateEventInputs = {
  actorId: string;
  params: CreateEventParams;
  requestId: string | null;
};

export class CreateEventService extends ApplicationService<
  CreateEventDeps,
  CreateEventInputs,
  Event
> {
  async call(): Promise<Event> {
    this.deps.logger.info('events.create.start', {
      flow: FLOW,
      requestId: this.inputs.requestId,
      actorId: this.inputs.actorId,
    });

    const actor = await this.authorize();
    const candidate = this.build(actor);
    const event = await this.persist(candidate);
    await this.dispatch(event);

    this.deps.logger.info('events.create.success', {
      flow: FLOW,
      requestId: this.inputs.requestId,
      eventId: event.id,
      ownerId: event.ownerId,
    });

    return event;
  }

  private async authorize(): Promise<User> {
    const actor = await this.deps.userStore.findUserById(this.inputs.actorId);
    assertActorExists(actor, this.inputs.actorId);
    assertCanCreateEvents(actor);
    return actor;
  }

  private build(actor: User): EventCandidate {
    const { name, startAt, endAt } = this.inputs.params;
    return {
      ownerId: actor.id,
      name,
      startAt,
      endAt: endAt ?? null,
    };
  }

  private async persist(candidate: EventCandidate): Promise<Event> {
    const valid = validateEvent(candidate);
    return this.deps.eventStore.insertEvent(valid);
  }

  private async dispatch(event: Event): Promise<void> {
    try {
      await this.deps.queue.enqueue({
        type: 'events.event-created',
        eventId: event.id,
        ownerId: event.ownerId,
        name: event.name,
        startAt: event.startAt.toISOString(),
      });
    } catch (err) {
      this.deps.logger.error('events.create.dispatch_failed', {
        flow: FLOW,
        requestId: this.inputs.requestId,
        eventId: event.id,
        ...errorFields(err),
      });
    }
  }
}
