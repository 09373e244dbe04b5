/**
 * src/modules/credentials/credential.constants.ts
 *
 * Limits come from the primitives themselves (libargon2, OpenBSD bcrypt).
 * The parameter store and the decoder both enforce them.
 */

export const FIELD_DELIMITER = '$';
export const PARAM_SEPARATOR = ',';

export const ARGON2ID_TAG = 'argon2id';
export const BCRYPT_TAG = 'bcrypt';

/** Argon2 v1.3 (0x13). Hashes carrying any other version are rejected. */
export const ARGON2_VERSION = 19;

export const UINT32_MAX = 0xffff_ffff;

export const ARGON2ID_LIMITS = {
  /** The argon2 binding refuses any memory cost below 1 MiB. */
  minMemoryKiB: 1024,
  minMemoryPerLane: 8,
  minIterations: 1,
  minParallelism: 1,
  maxParallelism: 255,
  minSaltLength: 8,
  minKeyLength: 4,
} as const;

export const BCRYPT_MIN_COST = 4;
export const BCRYPT_MAX_COST = 31;

/** bcrypt only reads the first 72 bytes of its input. */
export const BCRYPT_MAX_PASSWORD_BYTES = 72;
