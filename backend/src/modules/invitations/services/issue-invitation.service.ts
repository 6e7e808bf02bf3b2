/**
 * backend/src/modules/invitations/services/issue-invitation.service.ts
 *
 * WHY:
 * - An event owner invites another family member (by email).
 *
 * STEPS (in order, each runs at most once):
 * 1) authorize:      event exists (NOT_FOUND), actor owns it (FORBIDDEN)
 * 2) resolveInvitee: user with that email exists (NOT_FOUND)
 * 3) build:          candidate invitation
 * 4) persist:        model rules (VALIDATION_ERROR), insert (CONFLICT if already invited)
 * 5) dispatch:       enqueue invitations.invitation-issued (best-effort)
 */

import { ApplicationService } from '../../../shared/service/application-service';
import type { Logger } from '../../../shared/logger/logger';
import { errorFields } from '../../../shared/logger/logger';
import type { Queue } from '../../../shared/messaging/queue';

import type { User, UserStore } from '../../users';
import type { Event } from '../../events/event.types';
import type { EventStore } from '../../events/event.store';
import { assertEventExists, assertIsEventOwner } from '../../events/policies/event-access.policy';

import type { InvitationStore } from '../invitation.store';
import type { Invitation, NewInvitation } from '../invitation.types';
import { InvitationErrors } from '../invitation.errors';
import { validateInvitation } from '../invitation.model';

const FLOW = 'invitations.issue';

export type IssueInvitationDeps = {
  userStore: UserStore;
  eventStore: EventStore;
  invitationStore: InvitationStore;
  queue: Queue;
  logger: Logger;
};

export type IssueInvitationInputs = {
  actorId: string;
  eventId: string;
  params: { email: string };
  requestId: string | null;
};

export class IssueInvitationService extends ApplicationService<
  IssueInvitationDeps,
  IssueInvitationInputs,
  Invitation
> {
  async call(): Promise<Invitation> {
    this.deps.logger.info('invitations.issue.start', {
      flow: FLOW,
      requestId: this.inputs.requestId,
      actorId: this.inputs.actorId,
      eventId: this.inputs.eventId,
    });

    const event = await this.authorize();
    const invitee = await this.resolveInvitee();
    const candidate = this.build(event, invitee);
    const invitation = await this.persist(candidate);
    await this.dispatch(invitation, event, invitee);

    this.deps.logger.info('invitations.issue.success', {
      flow: FLOW,
      requestId: this.inputs.requestId,
      invitationId: invitation.id,
      eventId: event.id,
    });

    return invitation;
  }

  private async authorize(): Promise<Event> {
    const event = await this.deps.eventStore.findEventById(this.inputs.eventId);
    assertEventExists(event, this.inputs.eventId);
    assertIsEventOwner(event, this.inputs.actorId);
    return event;
  }

  private async resolveInvitee(): Promise<User> {
    const invitee = await this.deps.userStore.findUserByEmail(this.inputs.params.email);
    if (!invitee) throw InvitationErrors.inviteeNotFound({ eventId: this.inputs.eventId });
    return invitee;
  }

  private build(event: Event, invitee: User): NewInvitation {
    return {
      eventId: event.id,
      userId: invitee.id,
      invitedByUserId: this.inputs.actorId,
    };
  }

  private async persist(candidate: NewInvitation): Promise<Invitation> {
    const valid = validateInvitation(candidate);

    const inserted = await this.deps.invitationStore.insertInvitation(valid);
    if (!inserted) {
      throw InvitationErrors.alreadyInvited({ eventId: valid.eventId, userId: valid.userId });
    }
    return inserted;
  }

  private async dispatch(invitation: Invitation, event: Event, invitee: User): Promise<void> {
    try {
      await this.deps.queue.enqueue({
        type: 'invitations.invitation-issued',
        invitationId: invitation.id,
        eventId: event.id,
        eventName: event.name,
        inviteeUserId: invitee.id,
        inviteeEmail: invitee.email,
        invitedByUserId: invitation.invitedByUserId,
      });
    } catch (err) {
      this.deps.logger.error('invitations.issue.dispatch_failed', {
        flow: FLOW,
        requestId: this.inputs.requestId,
        invitationId: invitation.id,
        ...errorFields(err),
      });
    }
  }
}
