/**
 * backend/src/modules/users/user.serializers.ts
 *
 * RULES:
 * - Response shapes are explicit (never spread a domain object into a reply).
 */

import type { User, UserRole } from './user.types';

export type UserResponse = {
  id: string;
  email: string;
  name: string;
  role: UserRole;
};

export function serializeUser(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    role: user.role,
  };
}
