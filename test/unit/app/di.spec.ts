import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';
import { buildDeps } from '../../../src/app/di';
import { UnsupportedAlgorithmError } from '../../../src/modules/credentials';
import { makeTestEnv, silentLogger } from '../../helpers/credential-test-helpers';

describe('buildDeps', () => {
  it('wires the configured default algorithm into the password hasher', async () => {
    const env = makeTestEnv();
    const deps = buildDeps(buildConfig({ PASSWORD_HASH_ALGORITHM: 'bcrypt' }), {
      logger: silentLogger(),
      env: () => env,
    });

    expect(deps.passwordHasher).toBe(deps.credentials.service);
    expect(deps.credentials.registry.names()).toEqual(['argon2id', 'bcrypt']);

    const encoded = await deps.passwordHasher.hash('password123');
    expect(encoded.startsWith('$bcrypt$c=4$')).toBe(true);
  });

  it('reads tunables from the env source it was given', () => {
    const env = makeTestEnv({ BCRYPT_COST: '11' });
    const deps = buildDeps(buildConfig({}), { logger: silentLogger(), env: () => env });

    expect(deps.parameterStore.resolveBcrypt()).toEqual({ cost: 11 });
  });

  it('fails at startup on an unknown default algorithm', () => {
    expect(() =>
      buildDeps(buildConfig({ PASSWORD_HASH_ALGORITHM: 'scrypt' }), { logger: silentLogger() }),
    ).toThrowError(UnsupportedAlgorithmError);
  });
});
