/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users and their event registrations (mutations).
 *
 * RULES:
 * - No transactions started here (caller owns tx).
 * - No StoreError.
 * - No policies.
 * - Bound to one executor: the store builds a repo per checked-out
 *   connection, callers owning a transaction pass the trx.
 * - Dependent user_has_event / report rows are left to the FK actions.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type {
  NewUser,
  Registration,
  RoleId,
  UserId,
  UserPasswordUpdate,
  UserProfileUpdate,
} from '../user.types';
import type { UserRow } from './user.query-sql';

function affected(count: bigint): boolean {
  return Number(count) > 0;
}

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Creates a new user. Email must be globally unique (enforced by DB constraint).
   * role_id falls back to the column default (VISITOR).
   */
  async insertUser(user: NewUser): Promise<UserRow> {
    return this.db
      .insertInto('user')
      .values({
        email: user.email.toLowerCase(),
        password: user.password,
        name: user.name,
        surname: user.surname,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /** Updates email, name and surname. Password and role are untouched. */
  async updateProfile(user: UserProfileUpdate): Promise<boolean> {
    const res = await this.db
      .updateTable('user')
      .set({
        email: user.email.toLowerCase(),
        name: user.name,
        surname: user.surname,
      })
      .where('id', '=', user.id)
      .executeTakeFirst();

    return affected(res.numUpdatedRows);
  }

  async updatePassword(user: UserPasswordUpdate): Promise<boolean> {
    const res = await this.db
      .updateTable('user')
      .set({ password: user.password })
      .where('id', '=', user.id)
      .executeTakeFirst();

    return affected(res.numUpdatedRows);
  }

  async updateRoleByEmail(params: { email: string; roleId: RoleId }): Promise<boolean> {
    const res = await this.db
      .updateTable('user')
      .set({ role_id: params.roleId })
      .where('email', '=', params.email.toLowerCase())
      .executeTakeFirst();

    return affected(res.numUpdatedRows);
  }

  async deleteUser(userId: UserId): Promise<boolean> {
    const res = await this.db.deleteFrom('user').where('id', '=', userId).executeTakeFirst();

    return affected(res.numDeletedRows);
  }

  /** Primary key (user_id, event_id) rejects a second registration. */
  async insertRegistration(registration: Registration): Promise<void> {
    await this.db
      .insertInto('user_has_event')
      .values({
        user_id: registration.userId,
        event_id: registration.eventId,
      })
      .execute();
  }

  async deleteRegistration(registration: Registration): Promise<boolean> {
    const res = await this.db
      .deleteFrom('user_has_event')
      .where('user_id', '=', registration.userId)
      .where('event_id', '=', registration.eventId)
      .executeTakeFirst();

    return affected(res.numDeletedRows);
  }
}
