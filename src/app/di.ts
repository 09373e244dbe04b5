/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates shared instances ONCE (logger, parameter store, algorithm registry).
 * - Keeps modules testable (tests pass their own env source / logger).
 *
 * RULES:
 * - No business logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';

import { logger as defaultLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { PasswordHasher } from '../shared/security/password-hasher';

import { createCredentialModule, EnvParameterStore } from '../modules/credentials';
import type { CredentialModule, EnvSource, ParameterStore } from '../modules/credentials';

export type AppDeps = {
  logger: Logger;

  parameterStore: ParameterStore;
  passwordHasher: PasswordHasher;

  // modules
  credentials: CredentialModule;
};

export function buildDeps(
  config: AppConfig,
  overrides: { logger?: Logger; env?: EnvSource } = {},
): AppDeps {
  const logger = overrides.logger ?? defaultLogger;
  logger.level = config.logLevel;

  // Tunables are re-read from this source on every hash/verify.
  const parameterStore: ParameterStore = new EnvParameterStore(overrides.env);

  const credentials = createCredentialModule({
    logger,
    parameterStore,
    defaultAlgorithm: config.passwordHashAlgorithm,
  });

  return {
    logger,
    parameterStore,
    passwordHasher: credentials.service,
    credentials,
  };
}
