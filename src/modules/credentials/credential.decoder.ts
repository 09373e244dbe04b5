/**
 * src/modules/credentials/credential.decoder.ts
 *
 * WHY:
 * - Pure parsing: encoded hash string → DecodedHash, or a typed error.
 * - No config, no crypto. The registry only supplies each tag's grammar, so an
 *   algorithm added with registry.extend() decodes like the built-ins.
 *
 * ERRORS:
 * - FormatError               wrong field count, bad params, bad base64, inconsistent lengths
 * - IncompatibilityError      algorithm version other than the one implemented here
 * - UnsupportedAlgorithmError tag not in the registry
 */

import type { HashAlgorithm } from './algorithms/hash-algorithm';
import type { AlgorithmRegistry } from './credential.registry';
import { FormatError, IncompatibilityError } from './credential.errors';
import type { DecodedHash } from './credential.types';
import { readHashFields } from './encoding/hash-format';
import type { Malformed } from './encoding/param-string';

export type ResolvedHash = Readonly<{ algorithm: HashAlgorithm; decoded: DecodedHash }>;

function formatError(malformed: Malformed): FormatError {
  return new FormatError(`Malformed encoded hash: ${malformed.reason}.`, {
    field: malformed.field,
  });
}

/** Decodes `encoded` and returns it together with the registry entry that owns it. */
export function resolveEncodedHash(encoded: string, registry: AlgorithmRegistry): ResolvedHash {
  const head = readHashFields(encoded);
  if (head.kind === 'malformed') throw formatError(head);

  // Lookup first: an unknown tag is UnsupportedAlgorithmError whatever follows it.
  const algorithm = registry.lookup(head.tag);
  const parsed = algorithm.parse(head.fields);

  switch (parsed.kind) {
    case 'decoded':
      return { algorithm, decoded: parsed.decoded };

    case 'incompatible':
      throw new IncompatibilityError({
        algorithm: parsed.algorithm,
        supportedVersion: parsed.supportedVersion,
        foundVersion: parsed.version,
      });

    case 'malformed':
      throw formatError(parsed);
  }
}

export function decodeHash(encoded: string, registry: AlgorithmRegistry): DecodedHash {
  return resolveEncodedHash(encoded, registry).decoded;
}
