import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

import type { Db } from '../../src/shared/db/db';
import type { DB } from '../../src/shared/db/schema';
import { migrateToLatest } from '../../src/shared/db/migrator';

/**
 * WHY:
 * - DAL/store tests need a real SQL engine but must not leave the process.
 * - In-memory SQLite, migrated with the same migrations as Postgres.
 *
 * RULES:
 * - One database per call: tests never share rows.
 * - Foreign keys ON (SQLite defaults to OFF), so cascades behave like Postgres.
 */
export async function buildTestDb(): Promise<Db> {
  const sqlite = new Database(':memory:');
  sqlite.pragma('foreign_keys = ON');

  const db = new Kysely<DB>({
    dialect: new SqliteDialect({ database: sqlite }),
  });

  await migrateToLatest(db);
  return db;
}

/**
 * A database that can never hand out a connection: every acquisition rejects
 * the way an unreachable server or exhausted pool would.
 */
export function buildUnreachableDb(message = 'connect ECONNREFUSED 127.0.0.1:5432'): Db {
  return new Kysely<DB>({
    dialect: new SqliteDialect({
      database: async () => {
        throw new Error(message);
      },
    }),
  });
}

export async function insertEvent(db: Db, title: string): Promise<number> {
  const row = await db
    .insertInto('event')
    .values({ title, date: '2026-11-05', location: 'Kyiv, Hall A', description: null })
    .returning('id')
    .executeTakeFirstOrThrow();
  return row.id;
}

export async function insertReport(
  db: Db,
  params: { eventId: number; speakerId: number | null; topic: string },
): Promise<number> {
  const row = await db
    .insertInto('report')
    .values({ event_id: params.eventId, speaker_id: params.speakerId, topic: params.topic })
    .returning('id')
    .executeTakeFirstOrThrow();
  return row.id;
}
