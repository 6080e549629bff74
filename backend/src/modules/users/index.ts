/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 * - Keep exports minimal; add more only when explicitly required.
 */

export { UserRecordStore } from './user-record-store';
export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { USER_ROLES, ROLE_IDS, USER_SORT_FIELDS } from './user.types';
export type {
  EventId,
  NewUser,
  ParticipantRole,
  Registration,
  User,
  UserFilter,
  UserId,
  UserListQuery,
  UserPasswordUpdate,
  UserProfileUpdate,
  UserRole,
} from './user.types';
export type { UserFilterInput, UserListQueryInput } from './user.schemas';
export type { UserStatement } from './dal/user.statements';
