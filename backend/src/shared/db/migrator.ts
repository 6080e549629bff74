/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One migration entry point shared by the CLI script (migrate.ts) and tests.
 * - Migrations are registered statically, so they load the same way under
 *   tsx, Vitest and compiled output.
 *
 * RULES:
 * - New migration = new file in ./migrations + one line in MIGRATIONS.
 * - Names sort lexically; keep the 0001_ prefix scheme.
 */

import { Migrator } from 'kysely';
import type { Kysely, Migration, MigrationProvider, MigrationResult } from 'kysely';

import * as conferenceSchema from './migrations/0001_conference_schema';

const MIGRATIONS: Record<string, Migration> = {
  '0001_conference_schema': conferenceSchema,
};

export const staticMigrationProvider: MigrationProvider = {
  async getMigrations() {
    return MIGRATIONS;
  },
};

export class MigrationFailedError extends Error {
  constructor(
    readonly results: MigrationResult[],
    cause: unknown,
  ) {
    super('Migration failed', { cause });
    this.name = 'MigrationFailedError';
  }
}

/**
 * Applies every pending migration. Throws MigrationFailedError when any step
 * fails; the per-migration results are kept on the error for logging.
 */
export async function migrateToLatest<DB>(db: Kysely<DB>): Promise<MigrationResult[]> {
  const migrator = new Migrator({ db, provider: staticMigrationProvider });
  const { error, results } = await migrator.migrateToLatest();

  if (error) {
    throw new MigrationFailedError(results ?? [], error);
  }

  return results ?? [];
}
