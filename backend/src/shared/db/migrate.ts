/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev/CI.
 * - Migrations are registered statically (migrations/index.ts), so no dynamic
 *   file loading is needed and the same code runs under tsx or a build.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace=backend
 */

import 'dotenv/config';

import { Migrator } from 'kysely';
import type { MigrationProvider } from 'kysely';

import { createDb } from './db';
import type { Db } from './db';
import { MIGRATIONS } from './migrations';
import { buildConfig } from '../../app/config';
import { errorFields, logger } from '../logger/logger';

const provider: MigrationProvider = {
  getMigrations: () => Promise.resolve(MIGRATIONS),
};

async function migrateToLatest(db: Db): Promise<void> {
  const migrator = new Migrator({ db, provider });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  if (error) throw error;
}

async function main(): Promise<void> {
  const config = buildConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const db = createDb(config.databaseUrl);
  try {
    await migrateToLatest(db);
    logger.info('migrations.up_to_date');
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  logger.error('migrations.failed', errorFields(err));
  process.exit(1);
});
