/**
 * backend/src/modules/invitations/invitation.types.ts
 *
 * WHY:
 * - An Invitation relates a User (invitee) to an Event.
 * - Lifecycle: issued as PENDING, then ACCEPTED or DECLINED by the invitee.
 *
 * RULES:
 * - respondedAt is set exactly when status leaves PENDING.
 */

export const INVITATION_STATUSES = ['PENDING', 'ACCEPTED', 'DECLINED'] as const;

export type InvitationStatus = (typeof INVITATION_STATUSES)[number];

/** Terminal statuses an invitee can move a PENDING invitation to. */
export type InvitationResponse = Exclude<InvitationStatus, 'PENDING'>;

export type InvitationId = string;

export type Invitation = {
  id: InvitationId;
  eventId: string;
  userId: string;
  invitedByUserId: string;

  status: InvitationStatus;
  respondedAt: Date | null;

  createdAt: Date;
};

export type NewInvitation = {
  eventId: string;
  userId: string;
  invitedByUserId: string;
};
