/**
 * backend/src/modules/invitations/invitation.controller.ts
 *
 * WHY:
 * - Maps HTTP -> one service call per endpoint.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';

import { eventParamsSchema } from '../events/event.schemas';

import { invitationParamsSchema, issueInvitationSchema } from './invitation.schemas';
import { serializeInvitation, serializeInvitationWithEvent } from './invitation.serializers';
import {
  IssueInvitationService,
  type IssueInvitationDeps,
} from './services/issue-invitation.service';
import { AcceptInvitationService } from './services/accept-invitation.service';
import { DeclineInvitationService } from './services/decline-invitation.service';
import type { RespondToInvitationDeps } from './services/respond-to-invitation.service';
import {
  ListMyInvitationsService,
  type ListMyInvitationsDeps,
} from './services/list-my-invitations.service';

export type InvitationControllerDeps = IssueInvitationDeps &
  RespondToInvitationDeps &
  ListMyInvitationsDeps;

export class InvitationController {
  constructor(private readonly deps: InvitationControllerDeps) {}

  async issue(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const params = eventParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid request params', {
        issues: params.error.issues,
      });
    }

    const parsed = issueInvitationSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const invitation = await IssueInvitationService.call(this.deps, {
      actorId: session.userId,
      eventId: params.data.eventId,
      params: parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send({ invitation: serializeInvitation(invitation) });
  }

  async listMine(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const items = await ListMyInvitationsService.call(this.deps, { actorId: session.userId });

    return reply.status(200).send({ invitations: items.map(serializeInvitationWithEvent) });
  }

  async accept(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const invitationId = this.parseInvitationId(req);

    const invitation = await AcceptInvitationService.call(this.deps, {
      actorId: session.userId,
      invitationId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ invitation: serializeInvitation(invitation) });
  }

  async decline(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const invitationId = this.parseInvitationId(req);

    const invitation = await DeclineInvitationService.call(this.deps, {
      actorId: session.userId,
      invitationId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ invitation: serializeInvitation(invitation) });
  }

  private parseInvitationId(req: FastifyRequest): string {
    const params = invitationParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid request params', {
        issues: params.error.issues,
      });
    }
    return params.data.invitationId;
  }
}
