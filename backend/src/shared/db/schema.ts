/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table interfaces for the conference schema.
 * - Column names are the contract with the database; they stay snake_case here
 *   and never leak past the DAL.
 *
 * RULES:
 * - Keep aligned with migrations/ (one change = migration + interface update).
 * - Generated<> marks columns the database fills in.
 */

import type { ColumnType, Generated } from 'kysely';

export interface RoleTable {
  id: number;
  name: string;
}

export interface UserTable {
  id: Generated<number>;
  email: string;
  password: string;
  name: string;
  surname: string;
  role_id: Generated<number>;
}

export interface EventTable {
  id: Generated<number>;
  title: string;
  // pg hands DATE back as a Date; SQLite keeps the ISO string
  date: ColumnType<Date | string, string, string>;
  location: string;
  description: string | null;
}

/** Speaker assignment: a report of an event, optionally given by a speaker. */
export interface ReportTable {
  id: Generated<number>;
  topic: string;
  event_id: number;
  speaker_id: number | null;
}

export interface UserHasEventTable {
  user_id: number;
  event_id: number;
}

export interface DB {
  role: RoleTable;
  user: UserTable;
  event: EventTable;
  report: ReportTable;
  user_has_event: UserHasEventTable;
}
