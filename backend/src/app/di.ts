/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - The only place that picks an implementation per collaborator
 *   (Postgres vs in-memory stores, Redis vs in-memory cache).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';

import { InMemQueue } from '../shared/messaging/inmem-queue';

import { InMemUserStore, KyselyUserStore, type UserStore } from '../modules/users';
import { InMemEventStore, KyselyEventStore, createEventModule } from '../modules/events';
import type { EventModule, EventStore } from '../modules/events';
import {
  InMemInvitationStore,
  KyselyInvitationStore,
  createInvitationModule,
} from '../modules/invitations';
import type { InvitationModule, InvitationStore } from '../modules/invitations';
import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';

export type Stores = {
  userStore: UserStore;
  eventStore: EventStore;
  invitationStore: InvitationStore;
};

export type AppDeps = Stores & {
  db: Db | null;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  passwordHasher: PasswordHasher;
  sessionStore: SessionStore;

  // messaging
  queue: InMemQueue;

  // modules
  auth: AuthModule;
  events: EventModule;
  invitations: InvitationModule;

  // lifecycle
  close: () => Promise<void>;
};

function requireUrl(value: string | null, name: string): string {
  if (!value) throw new Error(`${name} is required for the selected driver`);
  return value;
}

function buildStores(db: Db | null): Stores {
  if (!db) {
    return {
      userStore: new InMemUserStore(),
      eventStore: new InMemEventStore(),
      invitationStore: new InMemInvitationStore(),
    };
  }

  return {
    userStore: new KyselyUserStore(db),
    eventStore: new KyselyEventStore(db),
    invitationStore: new KyselyInvitationStore(db),
  };
}

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  const db =
    config.persistence === 'postgres'
      ? createDb(requireUrl(config.databaseUrl, 'DATABASE_URL'))
      : null;

  const redis =
    config.cache === 'redis'
      ? await RedisCache.connect(requireUrl(config.redisUrl, 'REDIS_URL'))
      : null;
  const cache: Cache = redis ?? new InMemCache();

  const stores = buildStores(db);

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds);

  // Phase 1: in-memory queue (swap for a real transport adapter here in production)
  const queue = new InMemQueue();

  // modules (no HTTP / no business logic here)
  const auth = createAuthModule({
    userStore: stores.userStore,
    passwordHasher,
    sessionStore,
    rateLimiter,
    logger,
    isProduction: config.nodeEnv === 'production',
  });

  const events = createEventModule({ ...stores, queue, logger });
  const invitations = createInvitationModule({ ...stores, queue, logger });

  return {
    ...stores,
    db,
    cache,
    logger,
    rateLimiter,
    passwordHasher,
    sessionStore,
    queue,
    auth,
    events,
    invitations,
    close: async () => {
      if (redis) await redis.close();
      if (db) await db.destroy();
    },
  };
}
