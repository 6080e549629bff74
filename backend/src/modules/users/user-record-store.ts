/**
 * backend/src/modules/users/user-record-store.ts
 *
 * WHY:
 * - The users module's persistence boundary: user CRUD plus event
 *   registration, one statement per call.
 * - Callers get a StoreResult, never a thrown driver error.
 *
 * HOW IT WORKS:
 * - Each call checks out ONE connection (`db.connection().execute`) and binds
 *   the repo/queries to it. Kysely releases the connection when the callback
 *   settles, on success and on failure alike.
 * - Any failure inside the scope is logged with the statement name and the
 *   ids/email involved, then returned as StoreError with the original error
 *   as `cause`. Row-mapping failures get kind 'invalid_row'.
 *
 * RULES:
 * - No retries. A failed call fails once, for that call.
 * - No policies (who may change a role is the caller's business).
 * - Passwords are never logged.
 */

import type { ZodError } from 'zod';

import type { ConnectionProvider, DbExecutor } from '../../shared/db/db';
import { describeCause, StoreError, storeErr, storeOk } from '../../shared/db/store-result';
import type { StoreErrorMeta, StoreResult } from '../../shared/db/store-result';
import { withContext } from '../../shared/logger/with-context';
import type { ContextLogger } from '../../shared/logger/with-context';
import { UserRepo } from './dal/user.repo';
import type { UserStatement } from './dal/user.statements';
import {
  countUsers,
  getUserByEmail,
  getUserById,
  isUserRegistered,
  listEventParticipants,
  listUsers,
  listUsersPage,
  toUser,
  UnknownRoleError,
} from './queries/user.queries';
import { userFilterSchema, userListQuerySchema } from './user.schemas';
import type { UserFilterInput, UserListQueryInput } from './user.schemas';
import { ROLE_IDS } from './user.types';
import type {
  EventId,
  NewUser,
  ParticipantRole,
  User,
  UserId,
  UserPasswordUpdate,
  UserProfileUpdate,
  UserRole,
} from './user.types';

type Scoped<T> = (conn: { db: DbExecutor; repo: UserRepo }) => Promise<T>;

function formatIssues(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export class UserRecordStore {
  private readonly log: ContextLogger;

  constructor(
    private readonly db: ConnectionProvider,
    opts: { log?: ContextLogger } = {},
  ) {
    this.log = opts.log ?? withContext({ component: 'user-record-store' });
  }

  /**
   * The email is stored lowercased, so the returned User (and later reads)
   * carry `Ann@X.io` as `ann@x.io`.
   */
  async add(user: NewUser): Promise<StoreResult<User>> {
    return this.run(
      'ADD_USER',
      `Couldn't add new user ${user.email}`,
      { email: user.email },
      async ({ repo }) => toUser(await repo.insertUser(user)),
    );
  }

  async getById(userId: UserId): Promise<StoreResult<User | undefined>> {
    return this.run(
      'GET_USER_BY_ID',
      `Couldn't find user with id=${userId}`,
      { userId },
      ({ db }) => getUserById(db, userId),
    );
  }

  async getByEmail(email: string): Promise<StoreResult<User | undefined>> {
    return this.run(
      'GET_USER_BY_EMAIL',
      `Couldn't find user with email ${email}`,
      { email },
      ({ db }) => getUserByEmail(db, email),
    );
  }

  async getAll(): Promise<StoreResult<User[]>> {
    return this.run('GET_USERS', "Couldn't get list of all users", {}, ({ db }) => listUsers(db));
  }

  /**
   * Filtered, sorted, paginated listing. Input is validated before any
   * connection is taken; a rejected query comes back as kind 'invalid_query'.
   */
  async getSorted(input: UserListQueryInput = {}): Promise<StoreResult<User[]>> {
    const parsed = userListQuerySchema.safeParse(input);
    if (!parsed.success) {
      return this.rejectQuery('GET_SORTED', parsed.error);
    }

    const query = parsed.data;
    return this.run(
      'GET_SORTED',
      "Couldn't get sorted list of users",
      { sort: query.sort, limit: query.limit, offset: query.offset },
      ({ db }) => listUsersPage(db, query),
    );
  }

  async getParticipants(eventId: EventId, role: ParticipantRole): Promise<StoreResult<User[]>> {
    const statement: UserStatement = role === 'VISITOR' ? 'GET_PARTICIPANTS' : 'GET_SPEAKERS';
    return this.run(
      statement,
      `Couldn't get list of participants of event id=${eventId}`,
      { eventId, role },
      ({ db }) => listEventParticipants(db, { eventId, role }),
    );
  }

  async getNumberOfRecords(input: UserFilterInput = {}): Promise<StoreResult<number>> {
    const parsed = userFilterSchema.safeParse(input);
    if (!parsed.success) {
      return this.rejectQuery('GET_NUMBER_OF_RECORDS', parsed.error);
    }

    const filter = parsed.data;
    return this.run(
      'GET_NUMBER_OF_RECORDS',
      "Couldn't get number of users",
      { filter },
      ({ db }) => countUsers(db, filter),
    );
  }

  /** Resolves true when a row with `user.id` was updated. */
  async update(user: UserProfileUpdate): Promise<StoreResult<boolean>> {
    return this.run(
      'UPDATE_USER',
      `Couldn't update user ${user.email}`,
      { userId: user.id, email: user.email },
      ({ repo }) => repo.updateProfile(user),
    );
  }

  async updatePassword(user: UserPasswordUpdate): Promise<StoreResult<boolean>> {
    return this.run(
      'UPDATE_PASSWORD',
      `Couldn't update password of user id=${user.id}`,
      { userId: user.id },
      ({ repo }) => repo.updatePassword(user),
    );
  }

  async setUserRole(email: string, role: UserRole): Promise<StoreResult<boolean>> {
    return this.run(
      'SET_ROLE',
      `Couldn't set user ${email} role`,
      { email, role },
      ({ repo }) => repo.updateRoleByEmail({ email, roleId: ROLE_IDS[role] }),
    );
  }

  /** Registrations and speaker assignments follow via the schema's FK actions. */
  async delete(userId: UserId): Promise<StoreResult<boolean>> {
    return this.run(
      'DELETE_USER',
      `Couldn't delete user with id=${userId}`,
      { userId },
      ({ repo }) => repo.deleteUser(userId),
    );
  }

  async registerForEvent(userId: UserId, eventId: EventId): Promise<StoreResult<void>> {
    return this.run(
      'REGISTER_FOR_EVENT',
      `Couldn't register user with id=${userId} for event id=${eventId}`,
      { userId, eventId },
      ({ repo }) => repo.insertRegistration({ userId, eventId }),
    );
  }

  async cancelRegistration(userId: UserId, eventId: EventId): Promise<StoreResult<boolean>> {
    return this.run(
      'CANCEL_REGISTRATION',
      `Couldn't cancel registration of user with id=${userId} for event id=${eventId}`,
      { userId, eventId },
      ({ repo }) => repo.deleteRegistration({ userId, eventId }),
    );
  }

  async isRegistered(userId: UserId, eventId: EventId): Promise<StoreResult<boolean>> {
    return this.run(
      'IS_REGISTERED',
      `Couldn't check registration of user with id=${userId} for event id=${eventId}`,
      { userId, eventId },
      ({ db }) => isUserRegistered(db, { userId, eventId }),
    );
  }

  private async run<T>(
    statement: UserStatement,
    message: string,
    meta: StoreErrorMeta,
    work: Scoped<T>,
  ): Promise<StoreResult<T>> {
    try {
      const value = await this.db
        .connection()
        .execute((conn) => work({ db: conn, repo: new UserRepo(conn) }));
      return storeOk(value);
    } catch (err) {
      this.log.error('user_store.statement_failed', { statement, ...meta, err });
      return storeErr(
        new StoreError({
          statement,
          message: `${message} because of ${describeCause(err)}`,
          kind: err instanceof UnknownRoleError ? 'invalid_row' : 'driver',
          meta,
          cause: err,
        }),
      );
    }
  }

  private rejectQuery(statement: UserStatement, error: ZodError): StoreResult<never> {
    const message = `Invalid ${statement} query: ${formatIssues(error)}`;
    this.log.warn('user_store.query_rejected', { statement, issues: error.issues });
    return storeErr(new StoreError({ statement, message, kind: 'invalid_query', cause: error }));
  }
}
