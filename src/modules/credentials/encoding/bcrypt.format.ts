/**
 * src/modules/credentials/encoding/bcrypt.format.ts
 *
 * FORMAT:
 *   $bcrypt$c=<cost>$<base64 of the primitive's own "$2b$<cost>$<salt+hash>" string>
 *
 * The bcrypt string carries its own salt, so nothing else is stored. Its embedded
 * cost must agree with `c`.
 */

import {
  BCRYPT_MAX_COST,
  BCRYPT_MIN_COST,
  BCRYPT_TAG,
  FIELD_DELIMITER,
} from '../credential.constants';
import type { BcryptDecodedHash } from '../credential.types';
import { decodeRawBase64Strict, encodeRawBase64 } from './base64';
import type { ParsedHash } from './hash-format';
import { malformed, readParam, splitParams } from './param-string';

// $2a$ / $2b$ / $2y$, two-digit cost, 22 chars of salt + 31 chars of hash.
const MODULAR_CRYPT_BCRYPT = /^\$2[aby]\$(\d{2})\$[./A-Za-z0-9]{53}$/;

export function parseBcryptFields(fields: readonly string[]): ParsedHash<BcryptDecodedHash> {
  const [, , paramSegment, hashSegment, ...rest] = fields;
  if (paramSegment === undefined || hashSegment === undefined || rest.length > 0) {
    return malformed('fields', `bcrypt expects 4 "$"-separated fields, got ${fields.length}`);
  }

  const parts = splitParams(paramSegment);
  if (parts.length !== 1) {
    return malformed('params', 'expected "c=<cost>"');
  }

  const cost = readParam(parts[0], 'c', { min: BCRYPT_MIN_COST, max: BCRYPT_MAX_COST });
  if (typeof cost !== 'number') return cost;

  const hash = decodeRawBase64Strict(hashSegment);
  if (!hash) return malformed('hash', 'hash is not valid unpadded base64');

  const match = MODULAR_CRYPT_BCRYPT.exec(hash.toString('latin1'));
  if (!match) {
    return malformed('hash', 'hash is not a bcrypt string (too short or invalid)');
  }

  if (Number(match[1]) !== cost) {
    return malformed('c', '"c" does not match the cost embedded in the bcrypt string');
  }

  return {
    kind: 'decoded',
    decoded: {
      algorithm: 'bcrypt',
      params: { cost },
      salt: Buffer.alloc(0),
      hash,
    },
  };
}

export function formatBcryptHash(input: { cost: number; hash: Uint8Array }): string {
  return ['', BCRYPT_TAG, `c=${input.cost}`, encodeRawBase64(input.hash)].join(FIELD_DELIMITER);
}
