/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user. Email is stored lowercase.
 *
 * RULES:
 * - Keep aligned with DB schema (role ids match the `role` table rows).
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export const USER_ROLES = ['ADMIN', 'ORGANIZER', 'SPEAKER', 'VISITOR'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export const ROLE_IDS = {
  ADMIN: 1,
  ORGANIZER: 2,
  SPEAKER: 3,
  VISITOR: 4,
} as const satisfies Record<UserRole, number>;

export type RoleId = (typeof ROLE_IDS)[UserRole];

/** Roles that take part in an event; each one is backed by its own relation. */
export type ParticipantRole = Extract<UserRole, 'VISITOR' | 'SPEAKER'>;

export function roleFromId(roleId: number): UserRole | undefined {
  return USER_ROLES.find((role) => ROLE_IDS[role] === roleId);
}

export type UserId = number;
export type EventId = number;

export type User = {
  id: UserId;
  email: string;
  name: string;
  surname: string;
  /** Already-hashed credential; this module never sees plain passwords. */
  password: string;
  role: UserRole;
};

/** Input to `add`: the database assigns `id` and defaults `role` to VISITOR. */
export type NewUser = Omit<User, 'id' | 'role'>;

export type UserProfileUpdate = Pick<User, 'id' | 'email' | 'name' | 'surname'>;

export type UserPasswordUpdate = Pick<User, 'id' | 'password'>;

export type Registration = {
  userId: UserId;
  eventId: EventId;
};

export const USER_SORT_FIELDS = ['id', 'email', 'name', 'surname', 'role'] as const;

export type UserSortField = (typeof USER_SORT_FIELDS)[number];
export type SortDirection = 'asc' | 'desc';

export type UserFilter = {
  role?: UserRole;
  /** Substring of email, name or surname. */
  search?: string;
};

export type UserListQuery = {
  filter: UserFilter;
  sort: { field: UserSortField; direction: SortDirection };
  limit: number;
  offset: number;
};
