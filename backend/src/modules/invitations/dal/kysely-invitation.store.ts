/**
 * backend/src/modules/invitations/dal/kysely-invitation.store.ts
 *
 * WHY:
 * - Postgres implementation of InvitationStore (Kysely).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Writes are single guarded statements (no transactions needed).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { InvitationsTable } from '../../../shared/db/schema';
import type { InvitationStore } from '../invitation.store';
import type { Invitation, InvitationResponse, NewInvitation } from '../invitation.types';

type InvitationRow = Selectable<InvitationsTable>;

function toInvitation(row: InvitationRow): Invitation {
  return {
    id: row.id,
    eventId: row.event_id,
    userId: row.user_id,
    invitedByUserId: row.invited_by_user_id,
    status: row.status,
    respondedAt: row.responded_at ?? null,
    createdAt: row.created_at,
  };
}

export class KyselyInvitationStore implements InvitationStore {
  constructor(private readonly db: DbExecutor) {}

  async insertInvitation(params: NewInvitation): Promise<Invitation | undefined> {
    const row = await this.db
      .insertInto('invitations')
      .values({
        event_id: params.eventId,
        user_id: params.userId,
        invited_by_user_id: params.invitedByUserId,
        status: 'PENDING',
      })
      .onConflict((oc) => oc.columns(['event_id', 'user_id']).doNothing())
      .returningAll()
      .executeTakeFirst();

    return row ? toInvitation(row) : undefined;
  }

  async findInvitationById(invitationId: string): Promise<Invitation | undefined> {
    const row = await this.db
      .selectFrom('invitations')
      .selectAll()
      .where('id', '=', invitationId)
      .executeTakeFirst();

    return row ? toInvitation(row) : undefined;
  }

  async listInvitationsForEvent(eventId: string): Promise<Invitation[]> {
    const rows = await this.db
      .selectFrom('invitations')
      .selectAll()
      .where('event_id', '=', eventId)
      .orderBy('created_at', 'asc')
      .execute();

    return rows.map(toInvitation);
  }

  async listInvitationsForUser(userId: string): Promise<Invitation[]> {
    const rows = await this.db
      .selectFrom('invitations')
      .selectAll()
      .where('user_id', '=', userId)
      .orderBy('created_at', 'desc')
      .execute();

    return rows.map(toInvitation);
  }

  /**
   * Only updates while still PENDING (idempotency guard against double answers).
   */
  async markResponded(params: {
    invitationId: string;
    status: InvitationResponse;
    respondedAt: Date;
  }): Promise<Invitation | undefined> {
    const row = await this.db
      .updateTable('invitations')
      .set({
        status: params.status,
        responded_at: params.respondedAt,
      })
      .where('id', '=', params.invitationId)
      .where('status', '=', 'PENDING')
      .returningAll()
      .executeTakeFirst();

    return row ? toInvitation(row) : undefined;
  }
}
