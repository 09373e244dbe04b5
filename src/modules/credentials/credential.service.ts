/**
 * src/modules/credentials/credential.service.ts
 *
 * WHY:
 * - The PasswordHasher the rest of an application talks to.
 * - Adds the configured default algorithm, rehash checks and logging on top of
 *   the encoder / verifier / decoder.
 *
 * RULES:
 * - Never logs the plaintext password or the encoded hash; only the error code,
 *   the field at fault and the algorithm.
 * - Errors are logged and rethrown unchanged. Nothing is swallowed.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import { decodeHash } from './credential.decoder';
import type { CredentialEncoder } from './credential.encoder';
import { isCredentialError } from './credential.errors';
import type { AlgorithmRegistry } from './credential.registry';
import type { AlgorithmName, DecodedHash, EncodedHash } from './credential.types';
import type { CredentialVerifier } from './credential.verifier';
import { decideNeedsRehash } from './policies/needs-rehash.policy';

type Operation = 'hash' | 'verify' | 'decode' | 'needs_rehash';

export class CredentialService implements PasswordHasher {
  constructor(
    private readonly deps: {
      registry: AlgorithmRegistry;
      encoder: CredentialEncoder;
      verifier: CredentialVerifier;
      logger: Logger;
      defaultAlgorithm: AlgorithmName;
    },
  ) {}

  async hash(plain: string): Promise<EncodedHash> {
    return this.hashWith(this.deps.defaultAlgorithm, plain);
  }

  async hashWith(algorithm: AlgorithmName, plain: string): Promise<EncodedHash> {
    return this.track('hash', async () => {
      const encoded = await this.deps.encoder.encode(algorithm, plain);
      this.deps.logger.debug('credentials.hashed', { flow: 'credentials.hash', algorithm });
      return encoded;
    });
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return this.track('verify', () => this.deps.verifier.verify(plain, hash));
  }

  /** Structural view of a stored hash. Contains hash bytes: do not log the result. */
  decode(hash: string): DecodedHash {
    try {
      return decodeHash(hash, this.deps.registry);
    } catch (err: unknown) {
      this.logFailure('decode', err);
      throw err;
    }
  }

  async needsRehash(hash: string): Promise<boolean> {
    return this.track('needs_rehash', async () => {
      const decoded = decodeHash(hash, this.deps.registry);
      const preferred = this.deps.registry.lookup(this.deps.defaultAlgorithm);
      return decideNeedsRehash({
        decoded,
        target: { algorithm: preferred.name, params: preferred.currentParameters() },
      });
    });
  }

  private async track<T>(op: Operation, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      this.logFailure(op, err);
      throw err;
    }
  }

  private logFailure(op: Operation, err: unknown): void {
    const flow = `credentials.${op}`;

    if (!isCredentialError(err)) {
      this.deps.logger.error('credentials.unexpected_error', { flow, err });
      return;
    }

    const meta = { flow, code: err.code, field: err.field, meta: err.meta };

    // Bad config and broken crypto are operator problems; bad input is the caller's.
    if (err.code === 'CONFIGURATION_ERROR' || err.code === 'CRYPTO_FAILURE') {
      this.deps.logger.error(`${flow}_failed`, meta);
    } else {
      this.deps.logger.warn(`${flow}_rejected`, meta);
    }
  }
}
