/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv / persistence / cache are unions, so di.ts branches are exhaustive and
 *   typos ('prod', 'pg') fail at startup in Zod instead of falling through.
 * - DATABASE_URL is required only when PERSISTENCE=postgres, REDIS_URL only when CACHE=redis.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');
const PersistenceSchema = z.enum(['postgres', 'memory']).default('postgres');
const CacheDriverSchema = z.enum(['redis', 'memory']).default('redis');

// z.coerce.boolean() treats "false" as true; env flags need an explicit parse.
const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().default(3000),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('family-events-backend'),

    PERSISTENCE: PersistenceSchema,
    DATABASE_URL: z.string().min(1).optional(),

    CACHE: CacheDriverSchema,
    REDIS_URL: z.string().min(1).optional(),

    BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),
    SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: BooleanFlagSchema,
    SEED_PARENT_EMAIL: z.string().email().default('parent@example.com'),
    SEED_CHILD_EMAIL: z.string().email().default('child@example.com'),
    SEED_PASSWORD: z.string().min(8).default('dev-password'),
  })
  .superRefine((env, ctx) => {
    if (env.PERSISTENCE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when PERSISTENCE=postgres',
      });
    }
    if (env.CACHE === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when CACHE=redis',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type Persistence = z.infer<typeof PersistenceSchema>;
export type CacheDriver = z.infer<typeof CacheDriverSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  // Informational: shared/logger reads LOG_LEVEL itself, before config is built.
  logLevel: string;
  serviceName: string;

  persistence: Persistence;
  databaseUrl: string | null;

  cache: CacheDriver;
  redisUrl: string | null;

  bcryptCost: number;
  sessionTtlSeconds: number;

  seed: {
    enabled: boolean;
    parentEmail: string;
    childEmail: string;
    password: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    persistence: parsed.PERSISTENCE,
    databaseUrl: parsed.DATABASE_URL ?? null,

    cache: parsed.CACHE,
    redisUrl: parsed.REDIS_URL ?? null,

    bcryptCost: parsed.BCRYPT_COST,
    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    seed: {
      enabled: parsed.SEED_ON_START,
      parentEmail: parsed.SEED_PARENT_EMAIL,
      childEmail: parsed.SEED_CHILD_EMAIL,
      password: parsed.SEED_PASSWORD,
    },
  };
}
