/**
 * backend/src/modules/events/event.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { EventController } from './event.controller';

export function registerEventRoutes(app: FastifyInstance, controller: EventController) {
  app.post('/events', controller.create.bind(controller));
  app.get('/events', controller.list.bind(controller));
  app.get('/events/:eventId', controller.show.bind(controller));
}
