/**
 * src/modules/credentials/encoding/argon2id.format.ts
 *
 * FORMAT:
 *   $argon2id$v=<version>,m=<memory KiB>,t=<iterations>,p=<parallelism>$<salt>$<hash>
 *   salt/hash: unpadded standard base64.
 *
 * RULES:
 * - Salt and key lengths come from the decoded bytes, never from the string.
 * - The version is gated here, before salt/hash are looked at: a newer version
 *   may change what follows.
 * - `m` below 1024 KiB is malformed: the argon2 binding cannot derive with it,
 *   so such a hash could never be verified here.
 */

import {
  ARGON2ID_LIMITS,
  ARGON2ID_TAG,
  ARGON2_VERSION,
  FIELD_DELIMITER,
  UINT32_MAX,
} from '../credential.constants';
import type { Argon2idDecodedHash, Argon2idParameters } from '../credential.types';
import { decodeRawBase64Strict, encodeRawBase64 } from './base64';
import type { ParsedHash } from './hash-format';
import { malformed, readParam, splitParams } from './param-string';

export function parseArgon2idFields(fields: readonly string[]): ParsedHash<Argon2idDecodedHash> {
  const [, , paramSegment, saltSegment, hashSegment, ...rest] = fields;
  if (
    paramSegment === undefined ||
    saltSegment === undefined ||
    hashSegment === undefined ||
    rest.length > 0
  ) {
    return malformed('fields', `argon2id expects 5 "$"-separated fields, got ${fields.length}`);
  }

  const parts = splitParams(paramSegment);
  if (parts.length !== 4) {
    return malformed('params', 'expected "v=<version>,m=<memory>,t=<iterations>,p=<parallelism>"');
  }

  const version = readParam(parts[0], 'v', { min: 0, max: UINT32_MAX });
  if (typeof version !== 'number') return version;
  if (version !== ARGON2_VERSION) {
    return {
      kind: 'incompatible',
      algorithm: ARGON2ID_TAG,
      version,
      supportedVersion: ARGON2_VERSION,
    };
  }

  const memoryCostKiB = readParam(parts[1], 'm', {
    min: ARGON2ID_LIMITS.minMemoryKiB,
    max: UINT32_MAX,
  });
  if (typeof memoryCostKiB !== 'number') return memoryCostKiB;

  const iterations = readParam(parts[2], 't', {
    min: ARGON2ID_LIMITS.minIterations,
    max: UINT32_MAX,
  });
  if (typeof iterations !== 'number') return iterations;

  const parallelism = readParam(parts[3], 'p', {
    min: ARGON2ID_LIMITS.minParallelism,
    max: ARGON2ID_LIMITS.maxParallelism,
  });
  if (typeof parallelism !== 'number') return parallelism;

  if (memoryCostKiB < ARGON2ID_LIMITS.minMemoryPerLane * parallelism) {
    return malformed('m', '"m" is below 8 KiB per lane');
  }

  const salt = decodeRawBase64Strict(saltSegment);
  if (!salt) return malformed('salt', 'salt is not valid unpadded base64');
  if (salt.length < ARGON2ID_LIMITS.minSaltLength) {
    return malformed('salt', `salt is shorter than ${ARGON2ID_LIMITS.minSaltLength} bytes`);
  }

  const hash = decodeRawBase64Strict(hashSegment);
  if (!hash) return malformed('hash', 'hash is not valid unpadded base64');
  if (hash.length < ARGON2ID_LIMITS.minKeyLength) {
    return malformed('hash', `hash is shorter than ${ARGON2ID_LIMITS.minKeyLength} bytes`);
  }

  return {
    kind: 'decoded',
    decoded: {
      algorithm: 'argon2id',
      version,
      params: {
        memoryCostKiB,
        iterations,
        parallelism,
        saltLength: salt.length,
        keyLength: hash.length,
      },
      salt,
      hash,
    },
  };
}

export function formatArgon2idHash(input: {
  version: number;
  params: Pick<Argon2idParameters, 'memoryCostKiB' | 'iterations' | 'parallelism'>;
  salt: Uint8Array;
  hash: Uint8Array;
}): string {
  const { memoryCostKiB, iterations, parallelism } = input.params;
  const paramSegment = `v=${input.version},m=${memoryCostKiB},t=${iterations},p=${parallelism}`;

  return [
    '',
    ARGON2ID_TAG,
    paramSegment,
    encodeRawBase64(input.salt),
    encodeRawBase64(input.hash),
  ].join(FIELD_DELIMITER);
}
