/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * ORDER MATTERS:
 * - requestContext, then authContext (empty), then session (fills authContext).
 */

import Fastify from 'fastify';

import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.sessionStore);
  registerErrorHandler(app);

  app.addHook('onResponse', (req, reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
      userId: req.authContext?.userId ?? null,
    });
    done();
  });

  return app;
}
