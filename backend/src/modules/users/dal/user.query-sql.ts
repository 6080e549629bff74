/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 * - Filtering, sorting and pagination are composed from typed input; nothing
 *   caller-supplied is ever spliced into statement text.
 *
 * RULES:
 * - No StoreError (the store owns error translation).
 * - No policies.
 * - No transactions started here.
 */

import { sql } from 'kysely';
import type { Selectable, SelectQueryBuilder } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { DB, UserTable } from '../../../shared/db/schema';
import { ROLE_IDS } from '../user.types';
import type {
  EventId,
  Registration,
  UserFilter,
  UserId,
  UserListQuery,
  UserSortField,
} from '../user.types';

export type UserRow = Selectable<UserTable>;

const SORT_COLUMNS = {
  id: 'id',
  email: 'email',
  name: 'name',
  surname: 'surname',
  role: 'role_id',
} as const satisfies Record<UserSortField, keyof UserTable>;

const SEARCH_COLUMNS = ['email', 'name', 'surname'] as const;

const LIKE_ESCAPE = '!';

/** `%term%` with LIKE wildcards in the term matched literally. */
export function toContainsPattern(term: string): string {
  const escaped = term.toLowerCase().replace(/[!%_]/g, (c) => `${LIKE_ESCAPE}${c}`);
  return `%${escaped}%`;
}

function applyUserFilter<O>(
  qb: SelectQueryBuilder<DB, 'user', O>,
  filter: UserFilter,
): SelectQueryBuilder<DB, 'user', O> {
  let query = qb;

  if (filter.role) {
    query = query.where('role_id', '=', ROLE_IDS[filter.role]);
  }

  if (filter.search) {
    const pattern = toContainsPattern(filter.search);
    query = query.where((eb) =>
      eb.or(
        SEARCH_COLUMNS.map(
          (column) =>
            sql<boolean>`lower(${eb.ref(column)}) like ${pattern} escape ${sql.lit(LIKE_ESCAPE)}`,
        ),
      ),
    );
  }

  return query;
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: UserId,
): Promise<UserRow | undefined> {
  return db.selectFrom('user').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('user')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}

export async function selectUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('user').selectAll().orderBy('id', 'asc').execute();
}

export async function selectUsersPageSql(
  db: DbExecutor,
  query: UserListQuery,
): Promise<UserRow[]> {
  const column = SORT_COLUMNS[query.sort.field];

  let statement = applyUserFilter(db.selectFrom('user').selectAll(), query.filter).orderBy(
    column,
    query.sort.direction,
  );

  // Ties on non-unique columns must not reshuffle between pages.
  if (column !== 'id') {
    statement = statement.orderBy('id', 'asc');
  }

  return statement.limit(query.limit).offset(query.offset).execute();
}

export async function countUsersSql(db: DbExecutor, filter: UserFilter): Promise<number> {
  const row = await applyUserFilter(
    db.selectFrom('user').select((eb) => eb.fn.countAll<string | number | bigint>().as('count')),
    filter,
  ).executeTakeFirstOrThrow();

  // pg returns COUNT(*) as a string (bigint)
  return Number(row.count);
}

export async function selectEventVisitorsSql(
  db: DbExecutor,
  eventId: EventId,
): Promise<UserRow[]> {
  return db
    .selectFrom('user')
    .innerJoin('user_has_event', 'user_has_event.user_id', 'user.id')
    .selectAll('user')
    .where('user_has_event.event_id', '=', eventId)
    .orderBy('user.id', 'asc')
    .execute();
}

/** A speaker with several reports at one event is listed once. */
export async function selectEventSpeakersSql(
  db: DbExecutor,
  eventId: EventId,
): Promise<UserRow[]> {
  return db
    .selectFrom('user')
    .innerJoin('report', 'report.speaker_id', 'user.id')
    .selectAll('user')
    .distinct()
    .where('report.event_id', '=', eventId)
    .orderBy('user.id', 'asc')
    .execute();
}

export async function selectRegistrationSql(
  db: DbExecutor,
  registration: Registration,
): Promise<Registration | undefined> {
  const row = await db
    .selectFrom('user_has_event')
    .select(['user_id', 'event_id'])
    .where('user_id', '=', registration.userId)
    .where('event_id', '=', registration.eventId)
    .executeTakeFirst();

  if (!row) return undefined;
  return { userId: row.user_id, eventId: row.event_id };
}
