/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - The users store persists password hashes only; whoever creates users
 *   (seed, registration flow) hashes through this interface.
 * - Callers depend on an interface (DIP), not bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 * - if (hasher.needsRehash(hash)) store a new hash
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
  needsRehash(hash: string): boolean;
}
