/**
 * backend/src/modules/invitations/services/list-my-invitations.service.ts
 *
 * Invitations addressed to the actor, newest first, each with its event.
 */

import { ApplicationService } from '../../../shared/service/application-service';
import type { Event } from '../../events/event.types';
import type { EventStore } from '../../events/event.store';
import type { InvitationStore } from '../invitation.store';
import type { Invitation } from '../invitation.types';

export type ListMyInvitationsDeps = {
  invitationStore: InvitationStore;
  eventStore: EventStore;
};

export type ListMyInvitationsInputs = {
  actorId: string;
};

export type InvitationWithEvent = {
  invitation: Invitation;
  event: Event;
};

export class ListMyInvitationsService extends ApplicationService<
  ListMyInvitationsDeps,
  ListMyInvitationsInputs,
  InvitationWithEvent[]
> {
  async call(): Promise<InvitationWithEvent[]> {
    const invitations = await this.deps.invitationStore.listInvitationsForUser(
      this.inputs.actorId,
    );

    const withEvents = await Promise.all(
      invitations.map(async (invitation) => ({
        invitation,
        event: await this.deps.eventStore.findEventById(invitation.eventId),
      })),
    );

    return withEvents.flatMap(({ invitation, event }) => (event ? [{ invitation, event }] : []));
  }
}
