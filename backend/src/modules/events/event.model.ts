/**
 * backend/src/modules/events/event.model.ts
 *
 * WHY:
 * - The Event model: integrity rules every persisted event satisfies, plus its
 *   relationships. No business rules here (who may create, who is notified).
 *
 * RELATIONSHIPS:
 * - belongs to one owner (users.id via owner_id)
 * - has many invitations (invitations.event_id), see InvitationStore.listInvitationsForEvent
 *
 * RULES:
 * - name: present, trimmed, 1..200 chars
 * - startAt: present
 * - endAt: optional, never before startAt
 * - The 0002_events migration enforces the same rules in Postgres.
 */

import { z } from 'zod';
import { EventErrors } from './event.errors';
import type { EventCandidate, NewEvent } from './event.types';

export const EVENT_NAME_MAX_LENGTH = 200;

export const eventModelSchema = z
  .object({
    ownerId: z.string().min(1),
    name: z
      .string({ required_error: 'Name is required' })
      .trim()
      .min(1, 'Name is required')
      .max(EVENT_NAME_MAX_LENGTH, `Name must be at most ${EVENT_NAME_MAX_LENGTH} characters`),
    startAt: z.date({ required_error: 'Start time is required' }),
    endAt: z.date().nullable(),
  })
  .refine((e) => e.endAt === null || e.endAt.getTime() >= e.startAt.getTime(), {
    message: 'End time must not be before start time',
    path: ['endAt'],
  });

/**
 * Validates a candidate against the model rules.
 * Throws EventErrors.invalidEvent (VALIDATION_ERROR) listing every violated field.
 */
export function validateEvent(candidate: EventCandidate): NewEvent {
  const parsed = eventModelSchema.safeParse(candidate);
  if (!parsed.success) {
    throw EventErrors.invalidEvent({
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  return parsed.data;
}
