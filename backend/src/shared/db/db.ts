/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema (hand-maintained next to the migrations).
 *
 * HOW TO USE:
 * - const db = createDb({ databaseUrl, poolMax, connectionTimeoutMs })
 * - Stores acquire a single pooled connection per call via
 *   `db.connection().execute(async (conn) => ...)`; the connection is
 *   released when the callback settles, whatever the outcome.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for the main DB, a single checked-out connection, and transactions.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

/**
 * The connection-provisioning side of the DB: hands out one connection per
 * unit of work. Any Kysely instance satisfies it.
 */
export type ConnectionProvider = Pick<Db, 'connection'>;

export type CreateDbOptions = {
  databaseUrl: string;
  poolMax?: number;
  connectionTimeoutMs?: number;
};

export function createDb(opts: CreateDbOptions): Db {
  const pool = new pg.Pool({
    connectionString: opts.databaseUrl,
    max: opts.poolMax ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: opts.connectionTimeoutMs ?? 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
