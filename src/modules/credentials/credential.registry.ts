/**
 * src/modules/credentials/credential.registry.ts
 *
 * WHY:
 * - Maps algorithm name → HashAlgorithm. Built once in the composition root and
 *   passed to the encoder/verifier explicitly; there is no module-level map.
 * - Immutable: extend() returns a NEW registry, so a registry already handed to
 *   a service can never change under it.
 *
 * HOW TO USE:
 * - const registry = AlgorithmRegistry.of([new Argon2idAlgorithm(store), new BcryptAlgorithm(store)])
 * - registry.lookup('argon2id')   // throws UnsupportedAlgorithmError when unknown
 * - const more = registry.extend(new MyAlgorithm(store))
 */

import type { HashAlgorithm } from './algorithms/hash-algorithm';
import { UnsupportedAlgorithmError } from './credential.errors';
import type { AlgorithmName } from './credential.types';

export class AlgorithmRegistry {
  private readonly entries: ReadonlyMap<AlgorithmName, HashAlgorithm>;

  private constructor(entries: ReadonlyMap<AlgorithmName, HashAlgorithm>) {
    this.entries = entries;
  }

  static of(algorithms: readonly HashAlgorithm[]): AlgorithmRegistry {
    const entries = new Map<AlgorithmName, HashAlgorithm>();

    for (const algorithm of algorithms) {
      if (entries.has(algorithm.name)) {
        throw new Error(`AlgorithmRegistry: duplicate algorithm "${algorithm.name}".`);
      }
      entries.set(algorithm.name, algorithm);
    }

    return new AlgorithmRegistry(entries);
  }

  lookup(name: AlgorithmName): HashAlgorithm {
    const algorithm = this.entries.get(name);
    if (!algorithm) {
      throw new UnsupportedAlgorithmError(name);
    }
    return algorithm;
  }

  has(name: AlgorithmName): boolean {
    return this.entries.has(name);
  }

  names(): AlgorithmName[] {
    return [...this.entries.keys()];
  }

  extend(algorithm: HashAlgorithm): AlgorithmRegistry {
    return AlgorithmRegistry.of([...this.entries.values(), algorithm]);
  }
}
