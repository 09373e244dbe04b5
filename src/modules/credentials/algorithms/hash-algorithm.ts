/**
 * src/modules/credentials/algorithms/hash-algorithm.ts
 *
 * The single extension point: a new algorithm is a new HashAlgorithm registered
 * in the AlgorithmRegistry. It brings its own grammar (`parse`), so the encoder,
 * decoder, verifier and service don't change.
 */

import type {
  AlgorithmName,
  DecodedHash,
  EncodedHash,
  ParameterValues,
} from '../credential.types';
import type { ParsedHash } from '../encoding/hash-format';

export interface HashAlgorithm<D extends DecodedHash = DecodedHash> {
  /** Registry key and the tag written after the leading "$". */
  readonly name: AlgorithmName;

  /** Resolves current parameters, hashes `password`, returns the encoded string. */
  encode(password: string): Promise<EncodedHash>;

  /**
   * Reads the "$"-split fields of an encoded hash carrying this algorithm's tag
   * (fields[0] is "", fields[1] the tag). Pure: no configuration, no crypto.
   */
  parse(fields: readonly string[]): ParsedHash<D>;

  /** false on mismatch; throws only when `decoded` cannot be checked at all. */
  verify(password: string, decoded: D): Promise<boolean>;

  /** Parameters a new hash would get now. Throws ConfigurationError when they are invalid. */
  currentParameters(): ParameterValues;
}
