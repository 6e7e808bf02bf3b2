/**
 * backend/src/modules/invitations/dal/inmem-invitation.store.ts
 *
 * WHY:
 * - Lets tests and PERSISTENCE=memory runs work without Postgres.
 * - Mirrors the unique (event, user) constraint and the PENDING guard.
 * - Foreign keys are NOT mirrored: services load event + invitee before inserting.
 */

import { randomUUID } from 'node:crypto';
import type { InvitationStore } from '../invitation.store';
import type { Invitation, InvitationResponse, NewInvitation } from '../invitation.types';

export class InMemInvitationStore implements InvitationStore {
  private readonly rows = new Map<string, Invitation>();
  // insertion order doubles as createdAt order (timestamps can tie within 1ms)
  private readonly order: string[] = [];

  insertInvitation(params: NewInvitation): Promise<Invitation | undefined> {
    const duplicate = [...this.rows.values()].some(
      (i) => i.eventId === params.eventId && i.userId === params.userId,
    );
    if (duplicate) return Promise.resolve(undefined);

    const invitation: Invitation = {
      id: randomUUID(),
      eventId: params.eventId,
      userId: params.userId,
      invitedByUserId: params.invitedByUserId,
      status: 'PENDING',
      respondedAt: null,
      createdAt: new Date(),
    };

    this.rows.set(invitation.id, invitation);
    this.order.push(invitation.id);
    return Promise.resolve({ ...invitation });
  }

  findInvitationById(invitationId: string): Promise<Invitation | undefined> {
    const invitation = this.rows.get(invitationId);
    return Promise.resolve(invitation ? { ...invitation } : undefined);
  }

  listInvitationsForEvent(eventId: string): Promise<Invitation[]> {
    return Promise.resolve(this.ordered().filter((i) => i.eventId === eventId));
  }

  listInvitationsForUser(userId: string): Promise<Invitation[]> {
    return Promise.resolve(
      this.ordered()
        .filter((i) => i.userId === userId)
        .reverse(),
    );
  }

  markResponded(params: {
    invitationId: string;
    status: InvitationResponse;
    respondedAt: Date;
  }): Promise<Invitation | undefined> {
    const current = this.rows.get(params.invitationId);
    if (!current || current.status !== 'PENDING') return Promise.resolve(undefined);

    const updated: Invitation = {
      ...current,
      status: params.status,
      respondedAt: params.respondedAt,
    };
    this.rows.set(updated.id, updated);
    return Promise.resolve({ ...updated });
  }

  private ordered(): Invitation[] {
    return this.order.flatMap((id) => {
      const invitation = this.rows.get(id);
      return invitation ? [{ ...invitation }] : [];
    });
  }
}
