/**
 * src/modules/events/event.schemas.ts
 *
 * WHY:
 * - Permitted parameters for the Events endpoints.
 *
 * RULES:
 * - Unknown keys are stripped (zod default): ownerId, id, timestamps in a body are dropped.
 * - Presence is NOT enforced here for name/startAt. The Event model owns that rule,
 *   so every caller of CreateEventService gets the same validation.
 */

import { z } from 'zod';

const isoDateTime = z
  .string()
  .datetime({ offset: true, message: 'Must be an ISO-8601 date-time' })
  .transform((value) => new Date(value));

export const createEventSchema = z.object({
  name: z.string().optional(),
  startAt: isoDateTime.optional(),
  endAt: isoDateTime.nullable().optional(),
});

export type CreateEventInput = z.infer<typeof createEventSchema>;

export const eventParamsSchema = z.object({
  eventId: z.string().uuid('Invalid event id'),
});
