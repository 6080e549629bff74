/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations against the configured Postgres database.
 *
 * HOW TO USE:
 * - npm run db:migrate -w backend
 */

import { createDb } from './db';
import { migrateToLatest, MigrationFailedError } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb({
    databaseUrl: config.databaseUrl,
    poolMax: config.db.poolMax,
    connectionTimeoutMs: config.db.connectionTimeoutMs,
  });

  try {
    const results = await migrateToLatest(db);
    results.forEach((r) => {
      logger.info('migration success', { migration: r.migrationName });
    });
    logger.info('Migrations up to date', { applied: results.length });
  } catch (err) {
    if (err instanceof MigrationFailedError) {
      err.results
        .filter((r) => r.status === 'Error')
        .forEach((r) => logger.error('migration error', { migration: r.migrationName }));
    }
    throw err;
  } finally {
    await db.destroy();
  }
}

runMigrations().catch((err: unknown) => {
  logger.error('Migration failed', { err });
  process.exit(1);
});
