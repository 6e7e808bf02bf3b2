/**
 * backend/src/modules/users/dal/inmem-user.store.ts
 *
 * WHY:
 * - Lets tests and PERSISTENCE=memory runs work without Postgres.
 * - Mirrors the DB constraints that matter to callers (unique email, lowercase).
 * - Returns copies so callers can't mutate stored rows.
 */

import { randomUUID } from 'node:crypto';
import type { UserStore } from '../user.store';
import type { NewUser, User, UserCredentials } from '../user.types';

type StoredUser = { user: User; passwordHash: string };

export class InMemUserStore implements UserStore {
  private readonly rows = new Map<string, StoredUser>();

  findUserById(userId: string): Promise<User | undefined> {
    const stored = this.rows.get(userId);
    return Promise.resolve(stored ? { ...stored.user } : undefined);
  }

  findUserByEmail(email: string): Promise<User | undefined> {
    const stored = this.byEmail(email);
    return Promise.resolve(stored ? { ...stored.user } : undefined);
  }

  findCredentialsByEmail(email: string): Promise<UserCredentials | undefined> {
    const stored = this.byEmail(email);
    return Promise.resolve(
      stored ? { user: { ...stored.user }, passwordHash: stored.passwordHash } : undefined,
    );
  }

  insertUser(params: NewUser): Promise<User | undefined> {
    const email = params.email.toLowerCase();
    if (this.byEmail(email)) return Promise.resolve(undefined);

    const now = new Date();
    const user: User = {
      id: randomUUID(),
      email,
      name: params.name,
      role: params.role,
      createdAt: now,
      updatedAt: now,
    };

    this.rows.set(user.id, { user, passwordHash: params.passwordHash });
    return Promise.resolve({ ...user });
  }

  private byEmail(email: string): StoredUser | undefined {
    const normalized = email.toLowerCase();
    for (const stored of this.rows.values()) {
      if (stored.user.email === normalized) return stored;
    }
    return undefined;
  }
}
