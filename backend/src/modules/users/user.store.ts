/**
 * backend/src/modules/users/user.store.ts
 *
 * WHY:
 * - Persistence collaborator for users. Services depend on this interface only;
 *   di.ts picks KyselyUserStore (Postgres) or InMemUserStore.
 *
 * RULES:
 * - No AppError, no policies.
 * - Emails are normalized to lowercase by implementations (reads and writes).
 * - Conflicts are returned as `undefined`, not thrown.
 */

import type { NewUser, User, UserCredentials } from './user.types';

export interface UserStore {
  findUserById(userId: string): Promise<User | undefined>;
  findUserByEmail(email: string): Promise<User | undefined>;
  findCredentialsByEmail(email: string): Promise<UserCredentials | undefined>;

  /**
   * Inserts a user. Returns undefined when the email is already taken.
   */
  insertUser(params: NewUser): Promise<User | undefined>;
}
