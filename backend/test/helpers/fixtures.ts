import { randomUUID } from 'node:crypto';

import type { PasswordHasher } from '../../src/shared/security/password-hasher';
import type { User, UserRole, UserStore } from '../../src/modules/users';

export const TEST_PASSWORD = 'test-password';

/**
 * Inserts a member straight into the store (skips any HTTP flow).
 * Emails are unique per call so tests never collide.
 */
export async function seedMember(opts: {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  role: UserRole;
  email?: string;
  password?: string;
}): Promise<User> {
  const email = opts.email ?? `${opts.role.toLowerCase()}-${randomUUID().slice(0, 8)}@example.com`;
  const passwordHash = await opts.passwordHasher.hash(opts.password ?? TEST_PASSWORD);

  const user = await opts.userStore.insertUser({
    email,
    name: opts.role === 'PARENT' ? 'Test Parent' : 'Test Child',
    role: opts.role,
    passwordHash,
  });
  if (!user) throw new Error(`seedMember: email already taken: ${email}`);
  return user;
}

/** Hasher stand-in for unit tests: no bcrypt rounds. */
export const fakePasswordHasher: PasswordHasher = {
  hash: (plain) => Promise.resolve(`hashed:${plain}`),
  verify: (plain, hash) => Promise.resolve(hash === `hashed:${plain}`),
};
