import { describe, it, expect, vi } from 'vitest';

import { IssueInvitationService } from '../../../src/modules/invitations/services/issue-invitation.service';
import { logger } from '../../../src/shared/logger/logger';
import { catchAppError } from '../../helpers/catch-app-error';
import { makeUnitDeps } from '../../helpers/unit-deps';

const START = new Date('2026-06-01T10:00:00.000Z');

async function setup() {
  const deps = makeUnitDeps();
  const parent = await deps.member('PARENT');
  const child = await deps.member('CHILD', 'kid@example.com');
  const event = await deps.eventStore.insertEvent({
    ownerId: parent.id,
    name: 'Picnic',
    startAt: START,
    endAt: null,
  });
  return { deps, parent, child, event };
}

describe('IssueInvitationService', () => {
  it('creates a PENDING invitation and dispatches invitation-issued', async () => {
    const { deps, parent, child, event } = await setup();

    const invitation = await IssueInvitationService.call(deps, {
      actorId: parent.id,
      eventId: event.id,
      params: { email: 'kid@example.com' },
      requestId: 'req_1',
    });

    expect(invitation).toMatchObject({
      eventId: event.id,
      userId: child.id,
      invitedByUserId: parent.id,
      status: 'PENDING',
      respondedAt: null,
    });
    expect(deps.queue.drain()).toEqual([
      {
        type: 'invitations.invitation-issued',
        invitationId: invitation.id,
        eventId: event.id,
        eventName: 'Picnic',
        inviteeUserId: child.id,
        inviteeEmail: 'kid@example.com',
        invitedByUserId: parent.id,
      },
    ]);
  });

  it('only the owner may invite (FORBIDDEN), and nothing is written', async () => {
    const { deps, child, event } = await setup();
    const otherParent = await deps.member('PARENT');
    const insert = vi.spyOn(deps.invitationStore, 'insertInvitation');

    const err = await catchAppError(() =>
      IssueInvitationService.call(deps, {
        actorId: otherParent.id,
        eventId: event.id,
        params: { email: child.email },
        requestId: null,
      }),
    );

    expect(err.code).toBe('FORBIDDEN');
    expect(insert).not.toHaveBeenCalled();
    expect(deps.queue.drain()).toEqual([]);
  });

  it('unknown event -> NOT_FOUND, unknown invitee -> NOT_FOUND, self -> VALIDATION_ERROR', async () => {
    const { deps, parent, event } = await setup();

    const noEvent = await catchAppError(() =>
      IssueInvitationService.call(deps, {
        actorId: parent.id,
        eventId: 'evt_missing',
        params: { email: 'kid@example.com' },
        requestId: null,
      }),
    );
    const noInvitee = await catchAppError(() =>
      IssueInvitationService.call(deps, {
        actorId: parent.id,
        eventId: event.id,
        params: { email: 'nobody@example.com' },
        requestId: null,
      }),
    );
    const self = await catchAppError(() =>
      IssueInvitationService.call(deps, {
        actorId: parent.id,
        eventId: event.id,
        params: { email: parent.email },
        requestId: null,
      }),
    );

    expect(noEvent.message).toBe('Event not found');
    expect(noInvitee.message).toBe('No family member with that email');
    expect(self.code).toBe('VALIDATION_ERROR');
    expect(deps.queue.drain()).toEqual([]);
  });

  it('inviting the same member twice -> CONFLICT, dispatched once', async () => {
    const { deps, parent, child, event } = await setup();
    const inputs = {
      actorId: parent.id,
      eventId: event.id,
      params: { email: child.email },
      requestId: null,
    };

    await IssueInvitationService.call(deps, inputs);
    const err = await catchAppError(() => IssueInvitationService.call(deps, inputs));

    expect(err.status).toBe(409);
    expect(err.message).toBe('User is already invited to this event');
    expect(deps.queue.drain()).toHaveLength(1);
  });

  it('keeps the invitation when dispatch fails', async () => {
    const { deps, parent, child, event } = await setup();
    vi.spyOn(deps.queue, 'enqueue').mockRejectedValue(new Error('queue down'));
    const logError = vi.spyOn(logger, 'error').mockImplementation(() => logger);

    const invitation = await IssueInvitationService.call(deps, {
      actorId: parent.id,
      eventId: event.id,
      params: { email: child.email },
      requestId: null,
    });

    expect(await deps.invitationStore.findInvitationById(invitation.id)).toEqual(invitation);
    expect(logError).toHaveBeenCalledWith(
      'invitations.issue.dispatch_failed',
      expect.objectContaining({ invitationId: invitation.id }),
    );
  });
});
