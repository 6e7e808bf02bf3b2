/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes controller + routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import type { UserStore } from '../users';

import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  sessionStore: SessionStore;
  rateLimiter: RateLimiter;
  logger: Logger;
  isProduction: boolean;
}) {
  const controller = new AuthController(
    {
      userStore: deps.userStore,
      passwordHasher: deps.passwordHasher,
      sessionStore: deps.sessionStore,
      rateLimiter: deps.rateLimiter,
      logger: deps.logger,
    },
    deps.isProduction,
  );

  return {
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
