/**
 * backend/src/modules/events/event.controller.ts
 *
 * WHY:
 * - Maps HTTP -> one service call per endpoint.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (role checks live in the service's authorize step).
 * - The actor always comes from the session, never from the body.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';

import { serializeInvitation } from '../invitations/invitation.serializers';

import { createEventSchema, eventParamsSchema } from './event.schemas';
import { serializeEvent } from './event.serializers';
import { CreateEventService, type CreateEventDeps } from './services/create-event.service';
import { GetEventService, type GetEventDeps } from './services/get-event.service';
import { ListEventsService, type ListEventsDeps } from './services/list-events.service';

export type EventControllerDeps = CreateEventDeps & GetEventDeps & ListEventsDeps;

export class EventController {
  constructor(private readonly deps: EventControllerDeps) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = createEventSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const event = await CreateEventService.call(this.deps, {
      actorId: session.userId,
      params: parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({ event: serializeEvent(event) });
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const events = await ListEventsService.call(this.deps, { actorId: session.userId });

    return reply.status(200).send({ events: events.map(serializeEvent) });
  }

  async show(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const params = eventParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid request params', {
        issues: params.error.issues,
      });
    }

    const { event, invitations } = await GetEventService.call(this.deps, {
      actorId: session.userId,
      eventId: params.data.eventId,
    });

    return reply.status(200).send({
      event: serializeEvent(event),
      invitations: invitations.map(serializeInvitation),
    });
  }
}
