/**
 * src/modules/credentials/algorithms/bcrypt.algorithm.ts
 *
 * WHY:
 * - Bcrypt is kept for existing hashes and for deployments that prefer it.
 * - Its primitive owns salt generation and comparison, so we delegate both:
 *   encode wraps bcrypt.hash() output, verify hands the embedded string to
 *   bcrypt.compare() (which compares in constant time).
 *
 * VARIANTS:
 * - $2a$, $2b$ and $2y$ strings are all accepted. $2y$ is the same algorithm as
 *   $2b$ but the primitive only compares the latter, so it is relabelled first.
 *
 * LIMIT:
 * - bcrypt silently ignores input past 72 bytes. encode() refuses such passwords
 *   instead; verify() answers false for them, since encode() never produced one.
 */

import bcrypt from 'bcrypt';
import { BCRYPT_MAX_PASSWORD_BYTES, BCRYPT_TAG } from '../credential.constants';
import { CryptoFailure, PasswordTooLongError } from '../credential.errors';
import type { ParameterStore } from '../credential.params';
import type { BcryptDecodedHash, EncodedHash, ParameterValues } from '../credential.types';
import { formatBcryptHash, parseBcryptFields } from '../encoding/bcrypt.format';
import type { ParsedHash } from '../encoding/hash-format';
import type { HashAlgorithm } from './hash-algorithm';

function exceedsInputLimit(password: string): boolean {
  return Buffer.byteLength(password, 'utf8') > BCRYPT_MAX_PASSWORD_BYTES;
}

function toComparableBcrypt(modularCrypt: string): string {
  return modularCrypt.startsWith('$2y$') ? `$2b$${modularCrypt.slice(4)}` : modularCrypt;
}

export class BcryptAlgorithm implements HashAlgorithm<BcryptDecodedHash> {
  readonly name = BCRYPT_TAG;

  constructor(private readonly parameterStore: ParameterStore) {}

  async encode(password: string): Promise<EncodedHash> {
    const { cost } = this.parameterStore.resolveBcrypt();

    if (exceedsInputLimit(password)) {
      throw new PasswordTooLongError({
        algorithm: BCRYPT_TAG,
        maxBytes: BCRYPT_MAX_PASSWORD_BYTES,
      });
    }

    let hashed: string;
    try {
      hashed = await bcrypt.hash(password, cost);
    } catch (err: unknown) {
      throw new CryptoFailure('bcrypt hashing failed.', { meta: { cost }, cause: err });
    }

    return formatBcryptHash({ cost, hash: Buffer.from(hashed, 'latin1') });
  }

  parse(fields: readonly string[]): ParsedHash<BcryptDecodedHash> {
    return parseBcryptFields(fields);
  }

  async verify(password: string, decoded: BcryptDecodedHash): Promise<boolean> {
    if (exceedsInputLimit(password)) return false;

    try {
      return await bcrypt.compare(password, toComparableBcrypt(decoded.hash.toString('latin1')));
    } catch (err: unknown) {
      throw new CryptoFailure('bcrypt comparison failed.', {
        meta: { cost: decoded.params.cost },
        cause: err,
      });
    }
  }

  currentParameters(): ParameterValues {
    return this.parameterStore.resolveBcrypt();
  }
}
