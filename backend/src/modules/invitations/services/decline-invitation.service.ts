/**
 * backend/src/modules/invitations/services/decline-invitation.service.ts
 *
 * PENDING -> DECLINED. Declines are silent: the owner sees them on the event page.
 */

import type { Invitation } from '../invitation.types';
import { RespondToInvitationService } from './respond-to-invitation.service';

export class DeclineInvitationService extends RespondToInvitationService {
  protected readonly response = 'DECLINED' as const;
  protected readonly flow = 'invitations.decline';

  protected dispatch(_invitation: Invitation): Promise<void> {
    return Promise.resolve();
  }
}
