/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates:
 * - an ORGANIZER account (if missing), so a fresh database has someone who can
 *   create events and promote speakers.
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Roles themselves come from the schema migration, not from here.
 * - Stores only the bcrypt hash; the plain password never reaches the logs.
 */

import { unwrapStoreResult } from '../store-result';
import type { UserRecordStore } from '../../../modules/users/user-record-store';
import type { PasswordHasher } from '../../security/password-hasher';
import { withContext } from '../../logger/with-context';
import type { ContextLogger } from '../../logger/with-context';

type DevSeedOptions = {
  organizerEmail: string;
  organizerPassword: string;
};

export type DevSeedOutcome = 'created' | 'promoted' | 'exists';

export async function runDevSeed(opts: {
  store: UserRecordStore;
  passwordHasher: PasswordHasher;
  options: DevSeedOptions;
  log?: ContextLogger;
}): Promise<DevSeedOutcome> {
  const { store, passwordHasher, options } = opts;
  const log = opts.log ?? withContext({ flow: 'seed.dev' });
  const email = options.organizerEmail.toLowerCase();

  const existing = unwrapStoreResult(await store.getByEmail(email));

  if (existing?.role === 'ORGANIZER') {
    log.info('seed.organizer.exists', { userId: existing.id, email });
    return 'exists';
  }

  if (existing) {
    unwrapStoreResult(await store.setUserRole(email, 'ORGANIZER'));
    log.info('seed.organizer.promoted', {
      userId: existing.id,
      email,
      previousRole: existing.role,
    });
    return 'promoted';
  }

  const created = unwrapStoreResult(
    await store.add({
      email,
      password: await passwordHasher.hash(options.organizerPassword),
      name: 'Conference',
      surname: 'Organizer',
    }),
  );
  unwrapStoreResult(await store.setUserRole(email, 'ORGANIZER'));

  log.info('seed.organizer.created', { userId: created.id, email });
  return 'created';
}
