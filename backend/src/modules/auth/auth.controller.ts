/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for the auth endpoints.
 * - Sets the session cookie on login, clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';

import { serializeUser } from '../users';

import { loginSchema } from './auth.schemas';
import { LoginService, type LoginDeps } from './services/login.service';
import { LogoutService, type LogoutDeps } from './services/logout.service';

export type AuthControllerDeps = LoginDeps & LogoutDeps;

export class AuthController {
  constructor(
    private readonly deps: AuthControllerDeps,
    private readonly isProduction: boolean,
  ) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { user, sessionId } = await LoginService.call(this.deps, {
      email: parsed.data.email,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    setSessionCookie(reply, sessionId, this.isProduction);
    return reply.status(200).send({ user: serializeUser(user) });
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    await LogoutService.call(this.deps, {
      sessionId: session.sessionId,
      userId: session.userId,
      requestId: req.requestContext.requestId,
    });

    clearSessionCookie(reply, this.isProduction);
    return reply.status(204).send();
  }
}
