/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates (if missing):
 * - one PARENT member (can create events)
 * - one CHILD member (can be invited)
 *
 * Idempotent: safe to run on every start. Existing users are left untouched,
 * including their password.
 *
 * RULES:
 * - Never called in production (build-app.ts guards it).
 * - Goes through UserStore, so it works against Postgres and PERSISTENCE=memory alike.
 */

import type { PasswordHasher } from '../../security/password-hasher';
import type { UserStore } from '../../../modules/users/user.store';
import type { UserRole } from '../../../modules/users/user.types';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  parentEmail: string;
  childEmail: string;
  password: string;
};

type SeedUser = { email: string; name: string; role: UserRole };

export async function runDevSeed(opts: {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
}): Promise<{ created: number }> {
  const { userStore, passwordHasher, options } = opts;
  const flow = 'seed.dev';

  const wanted: SeedUser[] = [
    { email: options.parentEmail, name: 'Dev Parent', role: 'PARENT' },
    { email: options.childEmail, name: 'Dev Child', role: 'CHILD' },
  ];

  let created = 0;

  for (const seed of wanted) {
    const existing = await userStore.findUserByEmail(seed.email);
    if (existing) {
      logger.info('seed.user_exists', { flow, userId: existing.id, role: existing.role });
      continue;
    }

    const passwordHash = await passwordHasher.hash(options.password);
    const user = await userStore.insertUser({ ...seed, passwordHash });

    // lost a race with a concurrent start: the other process created it
    if (!user) continue;

    created += 1;
    logger.info('seed.user_created', { flow, userId: user.id, role: user.role });
  }

  return { created };
}
