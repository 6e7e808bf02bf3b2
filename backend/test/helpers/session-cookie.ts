import type { FastifyInstance, LightMyRequestResponse } from 'fastify';
import { z } from 'zod';

import { SESSION_COOKIE_NAME } from '../../src/shared/session/session.types';

const setCookieSchema = z.union([z.string(), z.array(z.string())]);

/**
 * Pulls `sid=<value>` out of a response's Set-Cookie header.
 * Returns null when the header is absent.
 */
export function readSessionCookie(res: LightMyRequestResponse): string | null {
  const raw = res.headers['set-cookie'];
  if (raw === undefined) return null;

  const values = setCookieSchema.parse(raw);
  const list = Array.isArray(values) ? values : [values];

  for (const value of list) {
    const first = value.split(';')[0] ?? '';
    if (first.startsWith(`${SESSION_COOKIE_NAME}=`)) return first;
  }
  return null;
}

/**
 * Logs in via POST /auth/login and returns the Cookie header value to send back.
 */
export async function loginAs(
  app: FastifyInstance,
  creds: { email: string; password: string },
): Promise<string> {
  const res = await app.inject({ method: 'POST', url: '/auth/login', payload: creds });
  if (res.statusCode !== 200) throw new Error(`loginAs: expected 200, got ${res.statusCode}`);

  const cookie = readSessionCookie(res);
  if (!cookie) throw new Error('loginAs: no session cookie in response');
  return cookie;
}
