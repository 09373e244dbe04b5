/**
 * src/modules/credentials/credential.verifier.ts
 *
 * WHY:
 * - One entry point for checking a password against any stored hash: the tag
 *   in the string picks the algorithm, whose grammar validates the rest.
 *
 * OUTCOMES:
 * - true / false        the hash was readable; false means "wrong password"
 * - FormatError         unreadable hash (including too-short strings like "" or "$x")
 * - UnsupportedAlgorithmError / IncompatibilityError / CryptoFailure
 */

import type { AlgorithmRegistry } from './credential.registry';
import { resolveEncodedHash } from './credential.decoder';

export class CredentialVerifier {
  constructor(private readonly registry: AlgorithmRegistry) {}

  async verify(password: string, encoded: string): Promise<boolean> {
    const { algorithm, decoded } = resolveEncodedHash(encoded, this.registry);
    return algorithm.verify(password, decoded);
  }
}
