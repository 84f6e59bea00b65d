/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and in deploy jobs.
 * - Migrations are registered statically below, so no directory scan or dynamic import.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace @keystone/backend
 * - New migration: add the file under ./migrations and register it here.
 */

import 'dotenv/config';

import { Migrator, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { errorMeta, logger } from '../logger/logger';

import * as m0001 from './migrations/0001_users';
import * as m0002 from './migrations/0002_credentials';

const provider: MigrationProvider = {
  getMigrations() {
    return Promise.resolve({
      '0001_users': m0001,
      '0002_credentials': m0002,
    });
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('Migration failed', { err: errorMeta(error) });
    process.exit(1);
  }

  logger.info('Migrations up to date');
}

runMigrations().catch((err: unknown) => {
  logger.error('Migration runner crashed', { err: errorMeta(err) });
  process.exit(1);
});
