/**
 * backend/src/modules/invitations/invitation.serializers.ts
 */

import type { Event } from '../events/event.types';
import { serializeEvent, type EventResponse } from '../events/event.serializers';
import type { Invitation, InvitationStatus } from './invitation.types';

export type InvitationResponseBody = {
  id: string;
  eventId: string;
  userId: string;
  invitedByUserId: string;
  status: InvitationStatus;
  respondedAt: string | null;
  createdAt: string;
};

export function serializeInvitation(invitation: Invitation): InvitationResponseBody {
  return {
    id: invitation.id,
    eventId: invitation.eventId,
    userId: invitation.userId,
    invitedByUserId: invitation.invitedByUserId,
    status: invitation.status,
    respondedAt: invitation.respondedAt ? invitation.respondedAt.toISOString() : null,
    createdAt: invitation.createdAt.toISOString(),
  };
}

export function serializeInvitationWithEvent(item: {
  invitation: Invitation;
  event: Event;
}): InvitationResponseBody & { event: EventResponse } {
  return {
    ...serializeInvitation(item.invitation),
    event: serializeEvent(item.event),
  };
}
