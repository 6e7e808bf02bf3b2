/**
 * backend/src/modules/users/dal/kysely-user.store.ts
 *
 * WHY:
 * - Postgres implementation of UserStore (Kysely).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Row -> domain mapping stays in this file.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';
import type { UserStore } from '../user.store';
import type { NewUser, User, UserCredentials } from '../user.types';

type UserRow = Selectable<UsersTable>;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    role: row.role,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyUserStore implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  private selectByEmail(email: string): Promise<UserRow | undefined> {
    return this.db
      .selectFrom('users')
      .selectAll()
      .where('email', '=', email.toLowerCase())
      .executeTakeFirst();
  }

  async findUserById(userId: string): Promise<User | undefined> {
    const row = await this.db
      .selectFrom('users')
      .selectAll()
      .where('id', '=', userId)
      .executeTakeFirst();

    return row ? toUser(row) : undefined;
  }

  async findUserByEmail(email: string): Promise<User | undefined> {
    const row = await this.selectByEmail(email);
    return row ? toUser(row) : undefined;
  }

  async findCredentialsByEmail(email: string): Promise<UserCredentials | undefined> {
    const row = await this.selectByEmail(email);
    return row ? { user: toUser(row), passwordHash: row.password_hash } : undefined;
  }

  async insertUser(params: NewUser): Promise<User | undefined> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: params.email.toLowerCase(),
        name: params.name,
        role: params.role,
        password_hash: params.passwordHash,
      })
      .onConflict((oc) => oc.column('email').doNothing())
      .returningAll()
      .executeTakeFirst();

    return row ? toUser(row) : undefined;
  }
}
