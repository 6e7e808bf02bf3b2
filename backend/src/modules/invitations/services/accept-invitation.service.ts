/**
 * backend/src/modules/invitations/services/accept-invitation.service.ts
 *
 * PENDING -> ACCEPTED, then tells the event owner.
 */

import { errorFields } from '../../../shared/logger/logger';
import type { Invitation } from '../invitation.types';
import { RespondToInvitationService } from './respond-to-invitation.service';

export class AcceptInvitationService extends RespondToInvitationService {
  protected readonly response = 'ACCEPTED' as const;
  protected readonly flow = 'invitations.accept';

  protected async dispatch(invitation: Invitation): Promise<void> {
    try {
      const event = await this.deps.eventStore.findEventById(invitation.eventId);
      if (!event) return; // event deleted meanwhile: nobody left to tell

      await this.deps.queue.enqueue({
        type: 'invitations.invitation-accepted',
        invitationId: invitation.id,
        eventId: invitation.eventId,
        inviteeUserId: invitation.userId,
        notifyUserId: event.ownerId,
      });
    } catch (err) {
      this.deps.logger.error('invitations.accept.dispatch_failed', {
        flow: this.flow,
        requestId: this.inputs.requestId,
        invitationId: invitation.id,
        ...errorFields(err),
      });
    }
  }
}
