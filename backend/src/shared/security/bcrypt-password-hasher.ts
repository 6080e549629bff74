/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt behind PasswordHasher; cost comes from config (BCRYPT_COST).
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: config.bcryptCost })
 * - After a successful verify, `needsRehash(hash)` tells the caller to store a
 *   fresh hash via the users store's updatePassword.
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const DEFAULT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? DEFAULT_COST;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }

  /** True when `hash` was produced with a different cost than configured. */
  needsRehash(hash: string): boolean {
    return bcrypt.getRounds(hash) !== this.cost;
  }
}
