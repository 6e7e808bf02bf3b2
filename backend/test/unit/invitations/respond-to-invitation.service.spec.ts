import { describe, it, expect, vi } from 'vitest';

import { AcceptInvitationService } from '../../../src/modules/invitations/services/accept-invitation.service';
import { DeclineInvitationService } from '../../../src/modules/invitations/services/decline-invitation.service';
import { ListMyInvitationsService } from '../../../src/modules/invitations/services/list-my-invitations.service';
import { logger } from '../../../src/shared/logger/logger';
import { catchAppError } from '../../helpers/catch-app-error';
import { makeUnitDeps } from '../../helpers/unit-deps';

const START = new Date('2026-06-01T10:00:00.000Z');

async function setup() {
  const deps = makeUnitDeps();
  const parent = await deps.member('PARENT');
  const child = await deps.member('CHILD');
  const event = await deps.eventStore.insertEvent({
    ownerId: parent.id,
    name: 'Picnic',
    startAt: START,
    endAt: null,
  });
  const invitation = await deps.invitationStore.insertInvitation({
    eventId: event.id,
    userId: child.id,
    invitedByUserId: parent.id,
  });
  if (!invitation) throw new Error('setup: invitation not inserted');

  return { deps, parent, child, event, invitation };
}

describe('AcceptInvitationService', () => {
  it('moves PENDING -> ACCEPTED and notifies the event owner', async () => {
    const { deps, parent, child, event, invitation } = await setup();

    const accepted = await AcceptInvitationService.call(deps, {
      actorId: child.id,
      invitationId: invitation.id,
      requestId: null,
    });

    expect(accepted.status).toBe('ACCEPTED');
    expect(accepted.respondedAt).toBeInstanceOf(Date);
    expect(deps.queue.drain()).toEqual([
      {
        type: 'invitations.invitation-accepted',
        invitationId: invitation.id,
        eventId: event.id,
        inviteeUserId: child.id,
        notifyUserId: parent.id,
      },
    ]);
  });

  it('only the invitee may answer: others get NOT_FOUND and the status is untouched', async () => {
    const { deps, parent, invitation } = await setup();

    const err = await catchAppError(() =>
      AcceptInvitationService.call(deps, {
        actorId: parent.id,
        invitationId: invitation.id,
        requestId: null,
      }),
    );

    expect(err.message).toBe('Invitation not found');
    expect((await deps.invitationStore.findInvitationById(invitation.id))?.status).toBe('PENDING');
    expect(deps.queue.drain()).toEqual([]);
  });

  it('an answered invitation cannot be answered again (CONFLICT)', async () => {
    const { deps, child, invitation } = await setup();
    const inputs = { actorId: child.id, invitationId: invitation.id, requestId: null };

    await DeclineInvitationService.call(deps, inputs);
    const err = await catchAppError(() => AcceptInvitationService.call(deps, inputs));

    expect(err.code).toBe('CONFLICT');
    expect((await deps.invitationStore.findInvitationById(invitation.id))?.status).toBe('DECLINED');
  });

  it('a concurrent answer that wins the guarded update -> CONFLICT, no dispatch', async () => {
    const { deps, child, invitation } = await setup();
    vi.spyOn(deps.invitationStore, 'markResponded').mockResolvedValue(undefined);

    const err = await catchAppError(() =>
      AcceptInvitationService.call(deps, {
        actorId: child.id,
        invitationId: invitation.id,
        requestId: null,
      }),
    );

    expect(err.message).toBe('Invitation has already been answered');
    expect(deps.queue.drain()).toEqual([]);
  });

  it('keeps the acceptance when dispatch fails', async () => {
    const { deps, child, invitation } = await setup();
    vi.spyOn(deps.queue, 'enqueue').mockRejectedValue(new Error('queue down'));
    const logError = vi.spyOn(logger, 'error').mockImplementation(() => logger);

    const accepted = await AcceptInvitationService.call(deps, {
      actorId: child.id,
      invitationId: invitation.id,
      requestId: null,
    });

    expect(accepted.status).toBe('ACCEPTED');
    expect(logError).toHaveBeenCalledWith(
      'invitations.accept.dispatch_failed',
      expect.objectContaining({ invitationId: invitation.id, message: 'queue down' }),
    );
  });
});

describe('DeclineInvitationService', () => {
  it('moves PENDING -> DECLINED without a notification', async () => {
    const { deps, child, invitation } = await setup();

    const declined = await DeclineInvitationService.call(deps, {
      actorId: child.id,
      invitationId: invitation.id,
      requestId: null,
    });

    expect(declined.status).toBe('DECLINED');
    expect(deps.queue.drain()).toEqual([]);
  });
});

describe('ListMyInvitationsService', () => {
  it('lists the actor’s invitations with their events', async () => {
    const { deps, parent, child, event, invitation } = await setup();

    expect(await ListMyInvitationsService.call(deps, { actorId: child.id })).toEqual([
      { invitation, event },
    ]);
    expect(await ListMyInvitationsService.call(deps, { actorId: parent.id })).toEqual([]);
  });
});
