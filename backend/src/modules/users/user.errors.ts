/**
 * backend/src/modules/users/user.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  actorNotFound(meta?: AppErrorMeta) {
    // Session points at a user that no longer exists: treat as signed out.
    return AppError.unauthorized('Authentication required', meta);
  },
} as const;
