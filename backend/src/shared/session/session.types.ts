/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in the Cache (Redis in prod) with a TTL.
 *
 * RULES:
 * - Session data must be JSON-serializable.
 * - Session cookie is HttpOnly, Secure (prod), SameSite=Strict.
 * - Never store passwords or hashes in session data.
 */

import { z } from 'zod';
import { USER_ROLES } from '../../modules/users/user.types';

export const sessionDataSchema = z.object({
  userId: z.string().min(1),
  role: z.enum(USER_ROLES),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof sessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/**
 * Session prefix in the cache. Full key: `session:{sessionId}`.
 */
export const SESSION_KEY_PREFIX = 'session';
