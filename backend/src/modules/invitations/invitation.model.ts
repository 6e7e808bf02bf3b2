/**
 * backend/src/modules/invitations/invitation.model.ts
 *
 * WHY:
 * - The Invitation model: integrity rules + the allowed status transitions.
 *
 * RELATIONSHIPS:
 * - belongs to one event (event_id) and one invitee (user_id)
 * - records who issued it (invited_by_user_id)
 * - unique per (event_id, user_id)
 */

import { InvitationErrors } from './invitation.errors';
import type { InvitationStatus, NewInvitation } from './invitation.types';

const TRANSITIONS: Record<InvitationStatus, readonly InvitationStatus[]> = {
  PENDING: ['ACCEPTED', 'DECLINED'],
  ACCEPTED: [],
  DECLINED: [],
};

export function canTransition(from: InvitationStatus, to: InvitationStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function validateInvitation(candidate: NewInvitation): NewInvitation {
  if (candidate.userId === candidate.invitedByUserId) {
    throw InvitationErrors.cannotInviteSelf({ eventId: candidate.eventId });
  }
  return candidate;
}
