/**
 * backend/src/modules/invitations/invitation.store.ts
 *
 * WHY:
 * - Persistence collaborator for invitations. Services depend on this interface only.
 *
 * RULES:
 * - No AppError, no policies.
 * - Conflicts / lost races are returned as `undefined`, not thrown.
 */

import type { Invitation, InvitationResponse, NewInvitation } from './invitation.types';

export interface InvitationStore {
  /**
   * Inserts a PENDING invitation.
   * Returns undefined when (eventId, userId) is already invited.
   */
  insertInvitation(params: NewInvitation): Promise<Invitation | undefined>;

  findInvitationById(invitationId: string): Promise<Invitation | undefined>;

  /** Ordered by createdAt ascending. */
  listInvitationsForEvent(eventId: string): Promise<Invitation[]>;

  /** Ordered by createdAt descending (newest first). */
  listInvitationsForUser(userId: string): Promise<Invitation[]>;

  /**
   * Moves an invitation out of PENDING.
   * Returns the updated invitation, or undefined if it was no longer PENDING.
   */
  markResponded(params: {
    invitationId: string;
    status: InvitationResponse;
    respondedAt: Date;
  }): Promise<Invitation | undefined>;
}
