/**
 * backend/src/modules/events/services/get-event.service.ts
 *
 * STEPS:
 * 1) load:      event + its invitations          -> NOT_FOUND if missing
 * 2) authorize: owner or invitee only            -> NOT_FOUND otherwise (no existence leak)
 */

import { ApplicationService } from '../../../shared/service/application-service';

import type { Invitation } from '../../invitations/invitation.types';
import type { InvitationStore } from '../../invitations/invitation.store';

import type { EventStore } from '../event.store';
import type { Event } from '../event.types';
import { EventErrors } from '../event.errors';
import { assertEventExists, canViewEvent } from '../policies/event-access.policy';

export type GetEventDeps = {
  eventStore: EventStore;
  invitationStore: InvitationStore;
};

export type GetEventInputs = {
  actorId: string;
  eventId: string;
};

export type EventWithInvitations = {
  event: Event;
  invitations: Invitation[];
};

export class GetEventService extends ApplicationService<
  GetEventDeps,
  GetEventInputs,
  EventWithInvitations
> {
  async call(): Promise<EventWithInvitations> {
    const loaded = await this.load();
    this.authorize(loaded);
    return loaded;
  }

  private async load(): Promise<EventWithInvitations> {
    const event = await this.deps.eventStore.findEventById(this.inputs.eventId);
    assertEventExists(event, this.inputs.eventId);

    const invitations = await this.deps.invitationStore.listInvitationsForEvent(event.id);
    return { event, invitations };
  }

  private authorize({ event, invitations }: EventWithInvitations): void {
    if (!canViewEvent(event, this.inputs.actorId, invitations)) {
      throw EventErrors.eventNotFound({ eventId: event.id });
    }
  }
}
