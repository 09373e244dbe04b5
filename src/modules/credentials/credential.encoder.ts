/**
 * src/modules/credentials/credential.encoder.ts
 *
 * encode(algorithm, password) → encoded hash string.
 *
 * Output is different on every call (fresh salt). Compare encodings by
 * verifying them, never by string equality.
 */

import type { AlgorithmRegistry } from './credential.registry';
import type { AlgorithmName, EncodedHash } from './credential.types';

export class CredentialEncoder {
  constructor(private readonly registry: AlgorithmRegistry) {}

  async encode(algorithm: AlgorithmName, password: string): Promise<EncodedHash> {
    return this.registry.lookup(algorithm).encode(password);
  }
}
