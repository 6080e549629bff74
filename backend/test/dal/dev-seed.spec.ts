import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { runDevSeed } from '../../src/shared/db/seed/dev-seed';
import { unwrapStoreResult } from '../../src/shared/db/store-result';

const options = {
  organizerEmail: 'Organizer@Example.com',
  organizerPassword: 'test-password',
};

describe('dev seed', () => {
  it('creates a hashed ORGANIZER account and is idempotent', async () => {
    const { deps, close } = await buildTestApp();

    try {
      const seed = () =>
        runDevSeed({
          store: deps.users.userRecordStore,
          passwordHasher: deps.passwordHasher,
          options,
        });

      expect(await seed()).toBe('created');
      expect(await seed()).toBe('exists');

      const all = unwrapStoreResult(await deps.users.userRecordStore.getAll());
      expect(all).toHaveLength(1);

      const organizer = all[0];
      expect(organizer?.email).toBe('organizer@example.com');
      expect(organizer?.role).toBe('ORGANIZER');
      expect(organizer?.password).not.toBe('test-password');
      expect(await deps.passwordHasher.verify('test-password', organizer?.password ?? '')).toBe(
        true,
      );
    } finally {
      await close();
    }
  });

  it('promotes an existing account instead of creating a second one', async () => {
    const { deps, close } = await buildTestApp();

    try {
      const store = deps.users.userRecordStore;
      unwrapStoreResult(
        await store.add({
          email: 'organizer@example.com',
          password: 'existing-hash',
          name: 'Olga',
          surname: 'Petrenko',
        }),
      );

      const outcome = await runDevSeed({
        store,
        passwordHasher: deps.passwordHasher,
        options,
      });

      expect(outcome).toBe('promoted');
      const user = unwrapStoreResult(await store.getByEmail('organizer@example.com'));
      expect(user).toMatchObject({ name: 'Olga', password: 'existing-hash', role: 'ORGANIZER' });
    } finally {
      await close();
    }
  });

  it('runs from buildApp when SEED_ON_START is enabled', async () => {
    const { deps, close } = await buildTestApp({
      seed: {
        enabled: true,
        organizerEmail: 'boot@example.com',
        organizerPassword: 'test-password',
      },
    });

    try {
      const user = unwrapStoreResult(
        await deps.users.userRecordStore.getByEmail('boot@example.com'),
      );
      expect(user?.role).toBe('ORGANIZER');
    } finally {
      await close();
    }
  });
});
