import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { Db } from '../../src/shared/db/db';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import {
  countUsersSql,
  selectEventSpeakersSql,
  selectRegistrationSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUsersPageSql,
  toContainsPattern,
} from '../../src/modules/users/dal/user.query-sql';
import {
  getUserByEmail,
  toUser,
  UnknownRoleError,
} from '../../src/modules/users/queries/user.queries';
import { ROLE_IDS } from '../../src/modules/users/user.types';
import { buildTestDb, insertEvent, insertReport } from '../helpers/build-test-db';

describe('users DAL', () => {
  let db: Db;
  let repo: UserRepo;

  beforeEach(async () => {
    db = await buildTestDb();
    repo = new UserRepo(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('insertUser creates a VISITOR and selectUserByEmail finds it', async () => {
    const created = await repo.insertUser({
      email: 'alice@example.com',
      password: 'hash-1',
      name: 'Alice',
      surname: 'Smith',
    });

    expect(created).toEqual({
      id: 1,
      email: 'alice@example.com',
      password: 'hash-1',
      name: 'Alice',
      surname: 'Smith',
      role_id: ROLE_IDS.VISITOR,
    });

    const row = await selectUserByEmailSql(db, 'alice@example.com');
    expect(row).toEqual(created);
  });

  it('normalizes email to lowercase on write and read', async () => {
    const created = await repo.insertUser({
      email: 'Bob@Example.COM',
      password: 'hash-2',
      name: 'Bob',
      surname: 'Jones',
    });

    expect(created.email).toBe('bob@example.com');

    const row = await selectUserByEmailSql(db, 'BOB@EXAMPLE.COM');
    expect(row?.id).toBe(created.id);
  });

  it('selectUserById returns undefined for a missing id', async () => {
    expect(await selectUserByIdSql(db, 404)).toBeUndefined();
  });

  it('updateRoleByEmail writes the role id', async () => {
    const created = await repo.insertUser({
      email: 'carol@example.com',
      password: 'hash-3',
      name: 'Carol',
      surname: 'White',
    });

    const updated = await repo.updateRoleByEmail({
      email: 'carol@example.com',
      roleId: ROLE_IDS.ORGANIZER,
    });

    expect(updated).toBe(true);
    expect((await selectUserByIdSql(db, created.id))?.role_id).toBe(2);
  });

  it('a repo bound to a transaction rolls back with it', async () => {
    const run = db.transaction().execute(async (trx) => {
      await new UserRepo(trx).insertUser({
        email: 'rolled@example.com',
        password: 'hash-4',
        name: 'Rolled',
        surname: 'Back',
      });
      throw new Error('abort');
    });

    await expect(run).rejects.toThrow('abort');
    expect(await selectUserByEmailSql(db, 'rolled@example.com')).toBeUndefined();
  });

  it('selectUsersPageSql and countUsersSql apply the same filter', async () => {
    for (const [email, name] of [
      ['dan@example.com', 'Dan'],
      ['dana@example.com', 'Dana'],
      ['eve@example.com', 'Eve'],
    ]) {
      await repo.insertUser({ email, password: 'h', name, surname: 'Doe' });
    }

    const page = await selectUsersPageSql(db, {
      filter: { search: 'dan' },
      sort: { field: 'email', direction: 'desc' },
      limit: 10,
      offset: 0,
    });

    expect(page.map((r) => r.email)).toEqual(['dana@example.com', 'dan@example.com']);
    expect(await countUsersSql(db, { search: 'dan' })).toBe(2);
    expect(await countUsersSql(db, {})).toBe(3);
  });

  it('selectEventSpeakersSql lists a speaker with several reports once', async () => {
    const speaker = await repo.insertUser({
      email: 'speaker@example.com',
      password: 'h',
      name: 'Sam',
      surname: 'Speaker',
    });
    const eventId = await insertEvent(db, 'DAL Conf');
    await insertReport(db, { eventId, speakerId: speaker.id, topic: 'One' });
    await insertReport(db, { eventId, speakerId: speaker.id, topic: 'Two' });

    const rows = await selectEventSpeakersSql(db, eventId);
    expect(rows.map((r) => r.id)).toEqual([speaker.id]);
  });

  it('insertRegistration / deleteRegistration round the join table', async () => {
    const user = await repo.insertUser({
      email: 'reg@example.com',
      password: 'h',
      name: 'Reg',
      surname: 'User',
    });
    const eventId = await insertEvent(db, 'Join Conf');

    await repo.insertRegistration({ userId: user.id, eventId });
    expect(await selectRegistrationSql(db, { userId: user.id, eventId })).toEqual({
      userId: user.id,
      eventId,
    });

    expect(await repo.deleteRegistration({ userId: user.id, eventId })).toBe(true);
    expect(await selectRegistrationSql(db, { userId: user.id, eventId })).toBeUndefined();
  });

  it('getUserByEmail returns the shaped domain type', async () => {
    await repo.insertUser({
      email: 'diana@example.com',
      password: 'h',
      name: 'Diana',
      surname: 'Prince',
    });

    const user = await getUserByEmail(db, 'diana@example.com');
    expect(user).toEqual({
      id: 1,
      email: 'diana@example.com',
      password: 'h',
      name: 'Diana',
      surname: 'Prince',
      role: 'VISITOR',
    });
  });
});

describe('toUser', () => {
  it('rejects a role id that has no domain role', () => {
    const row = { id: 1, email: 'x@y.z', password: 'h', name: 'X', surname: 'Y', role_id: 9 };

    expect(() => toUser(row)).toThrow(UnknownRoleError);
    expect(() => toUser(row)).toThrow('Unknown role_id 9');
  });
});

describe('toContainsPattern', () => {
  it('lowercases and escapes LIKE wildcards', () => {
    expect(toContainsPattern('Smith')).toBe('%smith%');
    expect(toContainsPattern('50%_off!')).toBe('%50!%!_off!!%');
  });
});
