/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) is resolved once per request, before any controller runs.
 * - Controllers read req.authContext to find the acting principal.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context (all null) on every request.
 * 2. Session middleware overwrites it with real values if a valid cookie exists.
 * 3. Controllers call requireSession(req) when the endpoint needs a principal.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { UserRole } from '../../modules/users/user.types';

export type AuthContext = {
  userId: string | null;
  role: UserRole | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      userId: null,
      role: null,
      sessionId: null,
    };

    done();
  });
}
