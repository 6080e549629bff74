/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No StoreError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countUsersSql,
  selectEventSpeakersSql,
  selectEventVisitorsSql,
  selectRegistrationSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUsersPageSql,
  selectUsersSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import { roleFromId } from '../user.types';
import type {
  EventId,
  ParticipantRole,
  Registration,
  User,
  UserFilter,
  UserId,
  UserListQuery,
} from '../user.types';

export class UnknownRoleError extends Error {
  constructor(readonly roleId: number) {
    super(`Unknown role_id ${roleId}`);
    this.name = 'UnknownRoleError';
  }
}

export function toUser(row: UserRow): User {
  const role = roleFromId(row.role_id);
  if (!role) throw new UnknownRoleError(row.role_id);

  return {
    id: row.id,
    email: row.email,
    name: row.name,
    surname: row.surname,
    password: row.password,
    role,
  };
}

export async function getUserById(db: DbExecutor, userId: UserId): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function listUsers(db: DbExecutor): Promise<User[]> {
  const rows = await selectUsersSql(db);
  return rows.map(toUser);
}

export async function listUsersPage(db: DbExecutor, query: UserListQuery): Promise<User[]> {
  const rows = await selectUsersPageSql(db, query);
  return rows.map(toUser);
}

export async function countUsers(db: DbExecutor, filter: UserFilter): Promise<number> {
  return countUsersSql(db, filter);
}

/** VISITOR reads registrations, SPEAKER reads report assignments. */
export async function listEventParticipants(
  db: DbExecutor,
  params: { eventId: EventId; role: ParticipantRole },
): Promise<User[]> {
  const rows =
    params.role === 'VISITOR'
      ? await selectEventVisitorsSql(db, params.eventId)
      : await selectEventSpeakersSql(db, params.eventId);
  return rows.map(toUser);
}

export async function isUserRegistered(
  db: DbExecutor,
  registration: Registration,
): Promise<boolean> {
  const row = await selectRegistrationSql(db, registration);
  return row !== undefined;
}
