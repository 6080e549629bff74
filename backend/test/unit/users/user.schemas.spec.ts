import { describe, it, expect } from 'vitest';
import { userFilterSchema, userListQuerySchema } from '../../../src/modules/users/user.schemas';

describe('userListQuerySchema', () => {
  it('fills in defaults for an empty query', () => {
    expect(userListQuerySchema.parse({})).toEqual({
      filter: {},
      sort: { field: 'id', direction: 'asc' },
      limit: 10,
      offset: 0,
    });
  });

  it('coerces pagination from query-string values', () => {
    const parsed = userListQuerySchema.parse({ limit: '25', offset: '50' });

    expect(parsed.limit).toBe(25);
    expect(parsed.offset).toBe(50);
  });

  it('accepts only enumerated sort fields', () => {
    expect(userListQuerySchema.safeParse({ sort: { field: 'surname' } }).success).toBe(true);
    expect(userListQuerySchema.safeParse({ sort: { field: 'password' } }).success).toBe(false);
    expect(
      userListQuerySchema.safeParse({ sort: { field: 'id; DROP TABLE user' } }).success,
    ).toBe(false);
  });

  it('bounds limit and offset', () => {
    expect(userListQuerySchema.safeParse({ limit: 0 }).success).toBe(false);
    expect(userListQuerySchema.safeParse({ limit: 101 }).success).toBe(false);
    expect(userListQuerySchema.safeParse({ limit: 100 }).success).toBe(true);
    expect(userListQuerySchema.safeParse({ offset: -1 }).success).toBe(false);
    expect(userListQuerySchema.safeParse({ offset: 1.5 }).success).toBe(false);
    expect(userListQuerySchema.safeParse({ offset: 1e20 }).success).toBe(false);
    expect(userListQuerySchema.safeParse({ offset: Number.MAX_SAFE_INTEGER }).success).toBe(true);
  });

  it('rejects unknown keys', () => {
    expect(userListQuerySchema.safeParse({ where: 'role_id = 1' }).success).toBe(false);
  });
});

describe('userFilterSchema', () => {
  it('trims the search term', () => {
    expect(userFilterSchema.parse({ search: '  smith ' })).toEqual({ search: 'smith' });
  });

  it('accepts known roles only', () => {
    expect(userFilterSchema.parse({ role: 'SPEAKER' })).toEqual({ role: 'SPEAKER' });
    expect(userFilterSchema.safeParse({ role: 'GUEST' }).success).toBe(false);
  });
});
