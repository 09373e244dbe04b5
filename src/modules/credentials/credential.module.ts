/**
 * src/modules/credentials/credential.module.ts
 *
 * WHY:
 * - Encapsulates credentials module wiring.
 * - DI passes infra in (logger, parameter store); the module composes the
 *   registry, encoder, verifier and service.
 *
 * RULES:
 * - No globals/singletons here.
 * - The registry is built once here and never mutated.
 */

import type { Logger } from '../../shared/logger/logger';
import { Argon2idAlgorithm } from './algorithms/argon2id.algorithm';
import { BcryptAlgorithm } from './algorithms/bcrypt.algorithm';
import type { HashAlgorithm } from './algorithms/hash-algorithm';
import { CredentialEncoder } from './credential.encoder';
import type { ParameterStore } from './credential.params';
import { AlgorithmRegistry } from './credential.registry';
import { CredentialService } from './credential.service';
import type { AlgorithmName } from './credential.types';
import { CredentialVerifier } from './credential.verifier';

export type CredentialModule = ReturnType<typeof createCredentialModule>;

export function createBuiltinRegistry(parameterStore: ParameterStore): AlgorithmRegistry {
  return AlgorithmRegistry.of([
    new Argon2idAlgorithm(parameterStore),
    new BcryptAlgorithm(parameterStore),
  ]);
}

export function createCredentialModule(deps: {
  logger: Logger;
  parameterStore: ParameterStore;
  defaultAlgorithm: AlgorithmName;
  extraAlgorithms?: readonly HashAlgorithm[];
}) {
  const registry = (deps.extraAlgorithms ?? []).reduce(
    (acc, algorithm) => acc.extend(algorithm),
    createBuiltinRegistry(deps.parameterStore),
  );

  // Fail at startup, not on the first hash, when the default is unknown.
  registry.lookup(deps.defaultAlgorithm);

  const encoder = new CredentialEncoder(registry);
  const verifier = new CredentialVerifier(registry);

  const service = new CredentialService({
    registry,
    encoder,
    verifier,
    logger: deps.logger,
    defaultAlgorithm: deps.defaultAlgorithm,
  });

  return {
    registry,
    encoder,
    verifier,
    service,
  };
}
