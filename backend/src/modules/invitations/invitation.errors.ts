/**
 * backend/src/modules/invitations/invitation.errors.ts
 *
 * WHY:
 * - Invitations module owns its domain semantics.
 *
 * SECURITY:
 * - An invitation addressed to somebody else is reported as NOT_FOUND,
 *   same as one that does not exist.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const InvitationErrors = {
  invitationNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Invitation not found', meta);
  },

  inviteeNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('No family member with that email', meta);
  },

  cannotInviteSelf(meta?: AppErrorMeta) {
    return AppError.validationError('You cannot invite yourself', meta);
  },

  alreadyInvited(meta?: AppErrorMeta) {
    return AppError.conflict('User is already invited to this event', meta);
  },

  alreadyAnswered(meta?: AppErrorMeta) {
    return AppError.conflict('Invitation has already been answered', meta);
  },
} as const;
