/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool) and shares them safely.
 * - Keeps modules testable: tests pass their own `db` (in-process SQLite).
 *
 * RULES:
 * - No business logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { createAppLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';
import { withContext } from '../shared/logger/with-context';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

export type AppDeps = {
  db: Db;
  logger: Logger;
  passwordHasher: PasswordHasher;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export function buildDeps(config: AppConfig, overrides: { db?: Db } = {}): AppDeps {
  const db =
    overrides.db ??
    createDb({
      databaseUrl: config.databaseUrl,
      poolMax: config.db.poolMax,
      connectionTimeoutMs: config.db.connectionTimeoutMs,
    });

  const logger = createAppLogger({
    level: config.logLevel,
    service: config.serviceName,
    env: config.nodeEnv,
  });

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });

  // modules
  const users = createUserModule({
    db,
    log: withContext({ component: 'user-record-store' }, logger),
  });

  return {
    db,
    logger,
    passwordHasher,
    users,
    close: async () => {
      await db.destroy();
    },
  };
}
