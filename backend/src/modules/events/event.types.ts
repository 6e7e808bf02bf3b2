/**
 * backend/src/modules/events/event.types.ts
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - endAt is nullable (open-ended events); name + startAt never are once persisted.
 */

export type EventId = string;

export type Event = {
  id: EventId;
  ownerId: string;

  name: string;
  startAt: Date;
  endAt: Date | null;

  createdAt: Date;
  updatedAt: Date;
};

/**
 * In-memory candidate produced by a service's build step.
 * Fields may be missing: the model decides whether it can be persisted.
 */
export type EventCandidate = {
  ownerId: string;
  name: string | undefined;
  startAt: Date | undefined;
  endAt: Date | null;
};

/** A candidate that passed the model rules. */
export type NewEvent = {
  ownerId: string;
  name: string;
  startAt: Date;
  endAt: Date | null;
};
