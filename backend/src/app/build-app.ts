/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable backend:
 *   config -> deps -> (dev seed)
 * - Makes tests simple (build once, use deps, close).
 *
 * RULES:
 * - No business logic here (only composition).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { AppDeps } from './di';
import type { Db } from '../shared/db/db';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { withContext } from '../shared/logger/with-context';

export type BuiltApp = {
  deps: AppDeps;
  close: () => Promise<void>;
};

export async function buildApp(config: AppConfig, overrides: { db?: Db } = {}): Promise<BuiltApp> {
  const deps = buildDeps(config, overrides);

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';
    const log = withContext({ flow }, deps.logger);

    if (config.nodeEnv === 'production') {
      log.warn('seed.skipped_in_production');
    } else {
      log.info('seed.start', { organizerEmail: config.seed.organizerEmail });

      try {
        const outcome = await runDevSeed({
          store: deps.users.userRecordStore,
          passwordHasher: deps.passwordHasher,
          log,
          options: {
            organizerEmail: config.seed.organizerEmail,
            organizerPassword: config.seed.organizerPassword,
          },
        });
        log.info('seed.done', { outcome });
      } catch (err) {
        await deps.close();
        throw err;
      }
    }
  }

  return {
    deps,
    close: deps.close,
  };
}
