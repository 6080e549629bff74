/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Users module is a support module (no routes of its own).
 *   Request handlers consume its store.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { ConnectionProvider } from '../../shared/db/db';
import type { ContextLogger } from '../../shared/logger/with-context';
import { UserRecordStore } from './user-record-store';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: ConnectionProvider; log?: ContextLogger }) {
  const userRecordStore = new UserRecordStore(deps.db, { log: deps.log });

  return {
    userRecordStore,
  };
}
