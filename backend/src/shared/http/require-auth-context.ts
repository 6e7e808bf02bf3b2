/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 * - Role checks are NOT done here: privilege rules belong to the service's
 *   authorize step, so they hold no matter which adapter calls the service.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { UserRole } from '../../modules/users/user.types';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: string;
  role: UserRole;
}>;

export function requireSession(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.sessionId || !ctx.userId || !ctx.role) {
    throw AppError.unauthorized('Authentication required');
  }

  return {
    sessionId: ctx.sessionId,
    userId: ctx.userId,
    role: ctx.role,
  };
}
