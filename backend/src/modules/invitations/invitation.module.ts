/**
 * backend/src/modules/invitations/invitation.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes stores + queue in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { UserStore } from '../users';
import type { EventStore } from '../events/event.store';
import type { InvitationStore } from './invitation.store';

import { InvitationController } from './invitation.controller';
import { registerInvitationRoutes } from './invitation.routes';

export type InvitationModule = ReturnType<typeof createInvitationModule>;

export function createInvitationModule(deps: {
  userStore: UserStore;
  eventStore: EventStore;
  invitationStore: InvitationStore;
  queue: Queue;
  logger: Logger;
}) {
  const controller = new InvitationController(deps);

  return {
    registerRoutes(app: FastifyInstance) {
      registerInvitationRoutes(app, controller);
    },
  };
}
