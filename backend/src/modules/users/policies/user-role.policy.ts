/**
 * backend/src/modules/users/policies/user-role.policy.ts
 *
 * WHY:
 * - Services authorize against the user as stored, not the role cached in the session.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 */

import type { User } from '../user.types';
import { UserErrors } from '../user.errors';

export function isParent(user: Pick<User, 'role'>): boolean {
  return user.role === 'PARENT';
}

export function assertActorExists(
  user: User | undefined,
  actorId: string,
): asserts user is User {
  if (!user) throw UserErrors.actorNotFound({ actorId });
}
