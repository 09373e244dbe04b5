/**
 * src/modules/credentials/encoding/hash-format.ts
 *
 * WHY:
 * - Splits an encoded hash into its "$" fields and reads the algorithm tag
 *   without indexing past the end of short or odd input.
 * - Defines what every algorithm's grammar returns, so the decoder can turn any
 *   of them into values or typed errors the same way.
 *
 * HOW TO USE:
 * - const head = readHashFields(encoded)        // { kind: 'fields', tag, fields } or Malformed
 * - algorithm.parse(head.fields)                 // ParsedHash<...>
 */

import type { DecodedHash } from '../credential.types';
import { FIELD_DELIMITER } from '../credential.constants';
import { type Malformed, malformed } from './param-string';

export type IncompatibleFormat = Readonly<{
  kind: 'incompatible';
  algorithm: string;
  version: number;
  supportedVersion: number;
}>;

export type ParsedHash<D extends DecodedHash = DecodedHash> =
  | Readonly<{ kind: 'decoded'; decoded: D }>
  | IncompatibleFormat
  | Malformed;

export type HashFields = Readonly<{ kind: 'fields'; tag: string; fields: readonly string[] }>;

export function readHashFields(encoded: string): HashFields | Malformed {
  const fields = encoded.split(FIELD_DELIMITER);

  // At least "$<tag>$<something>"; "" and "$bcrypt" are malformed, not "no match".
  if (fields.length < 3 || fields[0] !== '') {
    return malformed('fields', 'expected "$<algorithm>$<params>$..."');
  }

  const tag = fields[1];
  if (!tag) {
    return malformed('algorithm', 'missing algorithm tag');
  }

  return { kind: 'fields', tag, fields };
}
