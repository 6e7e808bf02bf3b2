/**
 * backend/src/modules/auth/services/login.service.ts
 *
 * STEPS:
 * 1) throttle:     per-email and per-IP counters     -> RATE_LIMITED
 * 2) authenticate: email + password (bcrypt)          -> UNAUTHORIZED (vague)
 * 3) persist:      server-side session in the cache
 *
 * RULES:
 * - Never log the email in clear: only its domain.
 */

import { ApplicationService } from '../../../shared/service/application-service';
import type { Logger } from '../../../shared/logger/logger';
import type { RateLimiter } from '../../../shared/security/rate-limit';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { SessionStore } from '../../../shared/session/session.store';

import type { User, UserStore } from '../../users';

import { AuthErrors } from '../auth.errors';
import { AUTH_RATE_LIMITS } from '../auth.constants';

const FLOW = 'auth.login';

function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export type LoginDeps = {
  userStore: UserStore;
  passwordHasher: PasswordHasher;
  sessionStore: SessionStore;
  rateLimiter: RateLimiter;
  logger: Logger;
};

export type LoginInputs = {
  email: string;
  password: string;
  ip: string;
  requestId: string | null;
};

export type LoginResult = {
  user: User;
  sessionId: string;
};

export class LoginService extends ApplicationService<LoginDeps, LoginInputs, LoginResult> {
  async call(): Promise<LoginResult> {
    const email = this.inputs.email.toLowerCase();

    this.deps.logger.info('auth.login.start', {
      flow: FLOW,
      requestId: this.inputs.requestId,
      emailDomain: emailDomain(email),
    });

    await this.throttle(email);
    const user = await this.authenticate(email);
    const sessionId = await this.persist(user);

    this.deps.logger.info('auth.login.success', {
      flow: FLOW,
      requestId: this.inputs.requestId,
      userId: user.id,
      role: user.role,
    });

    return { user, sessionId };
  }

  private async throttle(email: string): Promise<void> {
    await this.deps.rateLimiter.hitOrThrow({
      key: `login:email:${email}`,
      ...AUTH_RATE_LIMITS.login.perEmail,
    });

    await this.deps.rateLimiter.hitOrThrow({
      key: `login:ip:${this.inputs.ip}`,
      ...AUTH_RATE_LIMITS.login.perIp,
    });
  }

  private async authenticate(email: string): Promise<User> {
    const credentials = await this.deps.userStore.findCredentialsByEmail(email);
    if (!credentials) throw AuthErrors.invalidCredentials();

    const ok = await this.deps.passwordHasher.verify(
      this.inputs.password,
      credentials.passwordHash,
    );
    if (!ok) throw AuthErrors.invalidCredentials({ userId: credentials.user.id });

    return credentials.user;
  }

  private async persist(user: User): Promise<string> {
    return this.deps.sessionStore.create({
      userId: user.id,
      role: user.role,
      createdAt: new Date().toISOString(),
    });
  }
}
