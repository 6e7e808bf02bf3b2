/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side sessions via the Cache interface (Redis in prod, InMemCache in tests).
 * - Sessions are instantly revocable via destroy().
 *
 * RULES:
 * - No HTTP concerns here (cookie handling lives in middleware / controllers).
 * - No business rules.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { SESSION_KEY_PREFIX, sessionDataSchema } from './session.types';
import type { SessionData } from './session.types';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  /**
   * Creates a new session and returns the session ID.
   * The caller is responsible for setting the cookie.
   */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    return sessionId;
  }

  /**
   * Loads session data by ID. Returns null if expired, missing or corrupted.
   */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    const parsed = sessionDataSchema.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      await this.destroy(sessionId);
      return null;
    }

    return parsed.data;
  }

  async destroy(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }
}

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null; // schema check rejects it
  }
}
