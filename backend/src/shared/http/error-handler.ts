/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Error kind -> response is a pure function (toErrorResponse) so it can be
 *   unit tested without a server; the Fastify hook only logs and sends.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError -> status from APP_ERROR_STATUS, body from code + message.
 * - RateLimitError -> 429.
 * - Fastify's own 4xx errors (bad JSON, bad content-type) -> 400.
 * - Unexpected errors -> 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Always use withRequestContext(req) so requestId + userId land in every log line.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, APP_ERROR_STATUS } from './errors';
import type { AppErrorCode } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  error: {
    code: AppErrorCode;
    message: string;
  };
};

export type ErrorResponse = {
  status: number;
  body: ErrorResponseBody;
};

const SENSITIVE_META_KEYS = new Set([
  'password',
  'passwordHash',
  'sessionId',
  'token',
  'secret',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function build(code: AppErrorCode, message: string): ErrorResponse {
  return { status: APP_ERROR_STATUS[code], body: { error: { code, message } } };
}

// Fastify's own 4xx errors (malformed JSON, schema validation, bad content-type).
function isFastifyClientError(err: unknown): err is FastifyError {
  if (!(err instanceof Error) || !('statusCode' in err)) return false;
  const status = err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500;
}

/**
 * Maps any thrown value to the response the client sees.
 * Pure: no logging, no I/O.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof AppError) return build(err.code, err.message);

  if (err instanceof RateLimitError) {
    return build('RATE_LIMITED', 'Too many requests. Try again later.');
  }

  if (isFastifyClientError(err)) return build('VALIDATION_ERROR', 'Invalid request');

  return build('INTERNAL', 'Internal server error');
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);
    const response = toErrorResponse(err);

    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: response.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });
    } else if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });
    } else if (response.status === 500) {
      log.error('unhandled_error', {
        flow: 'http.error',
        message: err.message,
        stack: err.stack,
      });
    } else {
      log.warn('request_rejected', { flow: 'http.error', message: err.message });
    }

    return reply.status(response.status).send(response.body);
  });

  app.setNotFoundHandler((_req: FastifyRequest, reply: FastifyReply) => {
    const response = build('NOT_FOUND', 'Route not found');
    return reply.status(response.status).send(response.body);
  });
}
