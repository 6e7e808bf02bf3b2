/**
 * backend/src/modules/events/event.errors.ts
 *
 * WHY:
 * - Events module owns its domain semantics.
 *
 * SECURITY:
 * - Events the actor may not see are reported as NOT_FOUND (existence is not leaked).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const EventErrors = {
  parentRoleRequired(meta?: AppErrorMeta) {
    return AppError.forbidden('Only parents can create events', meta);
  },

  ownerRequired(meta?: AppErrorMeta) {
    return AppError.forbidden('Only the event owner can do this', meta);
  },

  eventNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Event not found', meta);
  },

  invalidEvent(meta?: AppErrorMeta) {
    return AppError.validationError('Event is invalid', meta);
  },
} as const;
