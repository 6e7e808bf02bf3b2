/**
 * backend/src/modules/invitations/policies/invitation.policy.ts
 *
 * WHY:
 * - Centralizes invitation answer rules.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level InvitationErrors.
 */

import type { Invitation, InvitationResponse } from '../invitation.types';
import { InvitationErrors } from '../invitation.errors';
import { canTransition } from '../invitation.model';

/**
 * Only the invitee may see or answer an invitation.
 * Somebody else's invitation is indistinguishable from a missing one.
 */
export function assertInvitationAddressedTo(
  invitation: Invitation | undefined,
  actorId: string,
): asserts invitation is Invitation {
  if (!invitation || invitation.userId !== actorId) {
    throw InvitationErrors.invitationNotFound();
  }
}

export function assertCanRespond(invitation: Invitation, response: InvitationResponse): void {
  if (!canTransition(invitation.status, response)) {
    throw InvitationErrors.alreadyAnswered({
      invitationId: invitation.id,
      status: invitation.status,
    });
  }
}
