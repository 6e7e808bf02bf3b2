/**
 * backend/src/modules/events/event.module.ts
 *
 * WHY:
 * - Encapsulates Events module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes stores + queue in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { UserStore } from '../users';
import type { InvitationStore } from '../invitations/invitation.store';
import type { EventStore } from './event.store';

import { EventController } from './event.controller';
import { registerEventRoutes } from './event.routes';

export type EventModule = ReturnType<typeof createEventModule>;

export function createEventModule(deps: {
  userStore: UserStore;
  eventStore: EventStore;
  invitationStore: InvitationStore;
  queue: Queue;
  logger: Logger;
}) {
  const controller = new EventController(deps);

  return {
    registerRoutes(app: FastifyInstance) {
      registerEventRoutes(app, controller);
    },
  };
}
