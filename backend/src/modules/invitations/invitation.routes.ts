/**
 * backend/src/modules/invitations/invitation.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { InvitationController } from './invitation.controller';

export function registerInvitationRoutes(app: FastifyInstance, controller: InvitationController) {
  app.post('/events/:eventId/invitations', controller.issue.bind(controller));
  app.get('/invitations', controller.listMine.bind(controller));
  app.post('/invitations/:invitationId/accept', controller.accept.bind(controller));
  app.post('/invitations/:invitationId/decline', controller.decline.bind(controller));
}
