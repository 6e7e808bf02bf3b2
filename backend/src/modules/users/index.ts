/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Public surface of the users module.
 * - Prevents cross-module coupling via deep imports.
 */

export type { User, UserRole, NewUser } from './user.types';
export type { UserStore } from './user.store';
export { KyselyUserStore } from './dal/kysely-user.store';
export { InMemUserStore } from './dal/inmem-user.store';
export { UserErrors } from './user.errors';
export { isParent, assertActorExists } from './policies/user-role.policy';
export { serializeUser, type UserResponse } from './user.serializers';
