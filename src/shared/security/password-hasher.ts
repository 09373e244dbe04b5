/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Callers depend on an interface (DIP), not on argon2/bcrypt directly.
 *
 * HOW TO USE:
 * - const hash = await hasher.hash(password)
 * - const ok = await hasher.verify(password, hash)
 * - if (ok && (await hasher.needsRehash(hash))) store(await hasher.hash(password))
 *
 * RULES:
 * - verify() resolves false for a wrong password and rejects only for a hash it
 *   cannot read (malformed, unknown algorithm, incompatible version).
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
  needsRehash(hash: string): Promise<boolean>;
}
