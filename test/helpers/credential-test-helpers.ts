import winston from 'winston';
import type { Logger } from '../../src/shared/logger/logger';
import {
  createBuiltinRegistry,
  createCredentialModule,
  decodeHash,
  EnvParameterStore,
  type AlgorithmName,
  type CredentialModule,
  type DecodedHash,
} from '../../src/modules/credentials';

export type TestEnv = Record<string, string | undefined>;

/** Hashes used across suites (not secrets). */
export const KNOWN_ARGON2ID_HASH =
  '$argon2id$v=19,m=65536,t=6,p=2$gQc4ZccIqosKqCMKYUgP8A$x/xg/7uiPsBrRd11wC0mtiM2fjeqHzqTcjs2fLMsiGw';

export const KNOWN_BCRYPT_HASH =
  '$bcrypt$c=4$JDJhJDA0JDVWaEhScW5XTUtESmN6U3NyL3FMZHV5UnBsamsxV08wTjNINXNmdVdFd0tmdU5MZ1I4ck02';

export function makeTestEnv(overrides: TestEnv = {}): TestEnv {
  return {
    ARGON2ID_MEMORY: '4096',
    ARGON2ID_ITERATIONS: '2',
    ARGON2ID_PARALLELISM: '1',
    ARGON2ID_SALT_LENGTH: '16',
    ARGON2ID_KEY_LENGTH: '32',
    BCRYPT_COST: '4',
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return winston.createLogger({ silent: true });
}

/**
 * Builds the credentials module over a MUTABLE env object, so a test can change
 * a tunable between calls and observe the next call picking it up.
 */
export function buildTestCredentials(
  opts: { env?: TestEnv; logger?: Logger; defaultAlgorithm?: AlgorithmName } = {},
): CredentialModule & { env: TestEnv; parameterStore: EnvParameterStore } {
  const env = opts.env ?? makeTestEnv();
  const parameterStore = new EnvParameterStore(() => env);

  const module = createCredentialModule({
    logger: opts.logger ?? silentLogger(),
    parameterStore,
    defaultAlgorithm: opts.defaultAlgorithm ?? 'argon2id',
  });

  return { ...module, env, parameterStore };
}

// Decoding reads no configuration.
const builtinGrammars = createBuiltinRegistry(new EnvParameterStore(() => ({})));

/** Decodes with the built-in algorithms only. */
export function decodeBuiltin(encoded: string): DecodedHash {
  return decodeHash(encoded, builtinGrammars);
}

/** Replaces the character at `index` with a different base64 character. */
export function flipBase64Char(value: string, index: number): string {
  const current = value.charAt(index);
  const replacement = current === 'A' ? 'B' : 'A';
  return value.slice(0, index) + replacement + value.slice(index + 1);
}

export function segments(encoded: string): string[] {
  return encoded.split('$');
}
