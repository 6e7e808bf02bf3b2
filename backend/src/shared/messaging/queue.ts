/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "somebody must be told" from "here is how they are told".
 * - Services enqueue messages in their dispatch step; the transport (SQS, email,
 *   push) is wired at the DI layer only. Services never change when transport changes.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared -> nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable (ISO strings, not Dates).
 * - Never put password hashes or session ids in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type EventCreatedMessage = {
  type: 'events.event-created';
  eventId: string;
  ownerId: string;
  name: string;
  startAt: string;
};

export type InvitationIssuedMessage = {
  type: 'invitations.invitation-issued';
  invitationId: string;
  eventId: string;
  eventName: string;
  inviteeUserId: string;
  inviteeEmail: string;
  invitedByUserId: string;
};

export type InvitationAcceptedMessage = {
  type: 'invitations.invitation-accepted';
  invitationId: string;
  eventId: string;
  inviteeUserId: string;
  /** The event owner is the one to notify. */
  notifyUserId: string;
};

export type QueueMessage = EventCreatedMessage | InvitationIssuedMessage | InvitationAcceptedMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
