import { describe, it, expect } from 'vitest';

import { LoginService } from '../../../src/modules/auth/services/login.service';
import { LogoutService } from '../../../src/modules/auth/services/logout.service';
import { InMemCache } from '../../../src/shared/cache/inmem-cache';
import { RateLimitError, RateLimiter } from '../../../src/shared/security/rate-limit';
import { SessionStore } from '../../../src/shared/session/session.store';
import { logger } from '../../../src/shared/logger/logger';
import { InMemUserStore } from '../../../src/modules/users/dal/inmem-user.store';
import { catchAppError } from '../../helpers/catch-app-error';
import { TEST_PASSWORD, fakePasswordHasher, seedMember } from '../../helpers/fixtures';

async function setup() {
  const cache = new InMemCache();
  const userStore = new InMemUserStore();
  const deps = {
    userStore,
    passwordHasher: fakePasswordHasher,
    sessionStore: new SessionStore(cache, 3600),
    rateLimiter: new RateLimiter(cache, { prefix: 'rl' }),
    logger,
  };
  const parent = await seedMember({
    userStore,
    passwordHasher: fakePasswordHasher,
    role: 'PARENT',
    email: 'parent@example.com',
  });
  return { deps, parent };
}

describe('LoginService', () => {
  it('creates a session for valid credentials (email is case-insensitive)', async () => {
    const { deps, parent } = await setup();

    const { user, sessionId } = await LoginService.call(deps, {
      email: 'Parent@Example.com',
      password: TEST_PASSWORD,
      ip: '10.0.0.1',
      requestId: null,
    });

    expect(user).toEqual(parent);
    expect(await deps.sessionStore.get(sessionId)).toMatchObject({
      userId: parent.id,
      role: 'PARENT',
    });
  });

  it('same vague error for a wrong password and an unknown email', async () => {
    const { deps } = await setup();

    const wrongPassword = await catchAppError(() =>
      LoginService.call(deps, {
        email: 'parent@example.com',
        password: 'not-the-password',
        ip: '10.0.0.1',
        requestId: null,
      }),
    );
    const unknownEmail = await catchAppError(() =>
      LoginService.call(deps, {
        email: 'nobody@example.com',
        password: TEST_PASSWORD,
        ip: '10.0.0.1',
        requestId: null,
      }),
    );

    expect(wrongPassword.status).toBe(401);
    expect(wrongPassword.message).toBe('Invalid email or password.');
    expect(unknownEmail.message).toBe(wrongPassword.message);
  });

  it('throttles after 5 attempts per email, even with the right password', async () => {
    const { deps } = await setup();
    const attempt = (password: string) =>
      LoginService.call(deps, {
        email: 'parent@example.com',
        password,
        ip: '10.0.0.1',
        requestId: null,
      });

    for (let i = 0; i < 5; i++) {
      await expect(attempt('wrong')).rejects.toMatchObject({ code: 'UNAUTHORIZED' });
    }

    await expect(attempt(TEST_PASSWORD)).rejects.toBeInstanceOf(RateLimitError);
  });
});

describe('LogoutService', () => {
  it('destroys the session', async () => {
    const { deps, parent } = await setup();
    const { sessionId } = await LoginService.call(deps, {
      email: parent.email,
      password: TEST_PASSWORD,
      ip: '10.0.0.1',
      requestId: null,
    });

    await LogoutService.call(deps, { sessionId, userId: parent.id, requestId: null });

    expect(await deps.sessionStore.get(sessionId)).toBeNull();
  });
});
