/**
 * backend/src/modules/invitations/services/respond-to-invitation.service.ts
 *
 * WHY:
 * - Accept and decline are the same transaction with a different target status
 *   and a different side effect. Subclasses pick both; the step order lives here.
 *
 * STEPS (in order, each runs at most once):
 * 1) authorize: invitation exists and is addressed to the actor (NOT_FOUND),
 *               and is still PENDING (CONFLICT)
 * 2) persist:   guarded PENDING -> response update (CONFLICT if a concurrent answer won)
 * 3) dispatch:  subclass side effect (best-effort)
 */

import { ApplicationService } from '../../../shared/service/application-service';
import type { Logger } from '../../../shared/logger/logger';
import type { Queue } from '../../../shared/messaging/queue';

import type { EventStore } from '../../events/event.store';

import type { InvitationStore } from '../invitation.store';
import type { Invitation, InvitationResponse } from '../invitation.types';
import { InvitationErrors } from '../invitation.errors';
import { assertCanRespond, assertInvitationAddressedTo } from '../policies/invitation.policy';

export type RespondToInvitationDeps = {
  invitationStore: InvitationStore;
  eventStore: EventStore;
  queue: Queue;
  logger: Logger;
};

export type RespondToInvitationInputs = {
  actorId: string;
  invitationId: string;
  requestId: string | null;
};

export abstract class RespondToInvitationService extends ApplicationService<
  RespondToInvitationDeps,
  RespondToInvitationInputs,
  Invitation
> {
  protected abstract readonly response: InvitationResponse;
  protected abstract readonly flow: string;

  async call(): Promise<Invitation> {
    this.deps.logger.info(`${this.flow}.start`, {
      flow: this.flow,
      requestId: this.inputs.requestId,
      actorId: this.inputs.actorId,
      invitationId: this.inputs.invitationId,
    });

    const pending = await this.authorize();
    const updated = await this.persist(pending);
    await this.dispatch(updated);

    this.deps.logger.info(`${this.flow}.success`, {
      flow: this.flow,
      requestId: this.inputs.requestId,
      invitationId: updated.id,
      eventId: updated.eventId,
      status: updated.status,
    });

    return updated;
  }

  protected abstract dispatch(invitation: Invitation): Promise<void>;

  private async authorize(): Promise<Invitation> {
    const invitation = await this.deps.invitationStore.findInvitationById(
      this.inputs.invitationId,
    );
    assertInvitationAddressedTo(invitation, this.inputs.actorId);
    assertCanRespond(invitation, this.response);
    return invitation;
  }

  private async persist(invitation: Invitation): Promise<Invitation> {
    const updated = await this.deps.invitationStore.markResponded({
      invitationId: invitation.id,
      status: this.response,
      respondedAt: new Date(),
    });

    if (!updated) {
      throw InvitationErrors.alreadyAnswered({ invitationId: invitation.id });
    }
    return updated;
  }
}
