/**
 * src/modules/credentials/algorithms/argon2id.algorithm.ts
 *
 * WHY:
 * - Argon2id is the default for new hashes (memory-hard, side-channel resistant).
 * - We ask the primitive for RAW key bytes and do the encoding ourselves, so the
 *   stored string follows our grammar and verification can use the same
 *   derivation plus a constant-time compare.
 *
 * MEMORY:
 * - Each call makes libargon2 allocate `memoryCostKiB` KiB for its duration.
 *   Nothing is pooled or kept between calls.
 */

import * as argon2 from 'argon2';
import { constantTimeEqual } from '../../../shared/security/constant-time';
import { ARGON2ID_TAG, ARGON2_VERSION } from '../credential.constants';
import { CryptoFailure } from '../credential.errors';
import type { ParameterStore } from '../credential.params';
import type {
  Argon2idDecodedHash,
  Argon2idParameters,
  EncodedHash,
  ParameterValues,
} from '../credential.types';
import { formatArgon2idHash, parseArgon2idFields } from '../encoding/argon2id.format';
import type { ParsedHash } from '../encoding/hash-format';
import { generateSalt } from '../helpers/generate-salt';
import type { HashAlgorithm } from './hash-algorithm';

/**
 * Derives `params.keyLength` raw bytes with Argon2id v1.3 (the primitive's default version).
 * Shared by encode and verify so both run the exact same derivation.
 */
export async function deriveArgon2idKey(
  password: string,
  salt: Buffer,
  params: Omit<Argon2idParameters, 'saltLength'>,
): Promise<Buffer> {
  try {
    return await argon2.hash(password, {
      type: argon2.argon2id,
      memoryCost: params.memoryCostKiB,
      timeCost: params.iterations,
      parallelism: params.parallelism,
      hashLength: params.keyLength,
      salt,
      raw: true,
    });
  } catch (err: unknown) {
    throw new CryptoFailure('argon2id key derivation failed.', {
      meta: {
        memoryCostKiB: params.memoryCostKiB,
        iterations: params.iterations,
        parallelism: params.parallelism,
      },
      cause: err,
    });
  }
}

export class Argon2idAlgorithm implements HashAlgorithm<Argon2idDecodedHash> {
  readonly name = ARGON2ID_TAG;

  constructor(private readonly parameterStore: ParameterStore) {}

  async encode(password: string): Promise<EncodedHash> {
    const params = this.parameterStore.resolveArgon2id();
    const salt = generateSalt(params.saltLength);
    const hash = await deriveArgon2idKey(password, salt, params);

    return formatArgon2idHash({ version: ARGON2_VERSION, params, salt, hash });
  }

  parse(fields: readonly string[]): ParsedHash<Argon2idDecodedHash> {
    return parseArgon2idFields(fields);
  }

  async verify(password: string, decoded: Argon2idDecodedHash): Promise<boolean> {
    const candidate = await deriveArgon2idKey(password, decoded.salt, decoded.params);
    return constantTimeEqual(decoded.hash, candidate);
  }

  currentParameters(): ParameterValues {
    return this.parameterStore.resolveArgon2id();
  }
}
