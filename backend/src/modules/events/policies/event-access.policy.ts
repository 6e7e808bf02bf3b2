/**
 * backend/src/modules/events/policies/event-access.policy.ts
 *
 * WHY:
 * - Centralizes who may create / see / manage events.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level EventErrors.
 */

import type { User } from '../../users/user.types';
import { isParent } from '../../users/policies/user-role.policy';
import type { Invitation } from '../../invitations/invitation.types';
import type { Event } from '../event.types';
import { EventErrors } from '../event.errors';

export function assertCanCreateEvents(actor: User): void {
  if (!isParent(actor)) {
    throw EventErrors.parentRoleRequired({ userId: actor.id, role: actor.role });
  }
}

export function assertEventExists(
  event: Event | undefined,
  eventId: string,
): asserts event is Event {
  if (!event) throw EventErrors.eventNotFound({ eventId });
}

export function assertIsEventOwner(event: Event, actorId: string): void {
  if (event.ownerId !== actorId) {
    throw EventErrors.ownerRequired({ eventId: event.id, actorId });
  }
}

/**
 * Owner and invitees (any status) may read an event.
 */
export function canViewEvent(
  event: Event,
  actorId: string,
  invitations: readonly Invitation[],
): boolean {
  if (event.ownerId === actorId) return true;
  return invitations.some((i) => i.userId === actorId);
}
