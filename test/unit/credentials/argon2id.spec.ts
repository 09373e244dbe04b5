import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  FormatError,
} from '../../../src/modules/credentials';
import {
  buildTestCredentials,
  decodeBuiltin,
  flipBase64Char,
  makeTestEnv,
  segments,
} from '../../helpers/credential-test-helpers';

const ARGON2ID_PATTERN = /^\$argon2id\$v=19,m=4096,t=2,p=1\$[A-Za-z0-9+/]{22}\$[A-Za-z0-9+/]{43}$/;

describe('argon2id encode / verify', () => {
  it('encodes to the canonical grammar and verifies', async () => {
    const { encoder, verifier } = buildTestCredentials();

    const encoded = await encoder.encode('argon2id', 'password123');

    expect(encoded).toMatch(ARGON2ID_PATTERN);
    await expect(verifier.verify('password123', encoded)).resolves.toBe(true);
  });

  it('wrong password => false, not an error', async () => {
    const { encoder, verifier } = buildTestCredentials();
    const encoded = await encoder.encode('argon2id', 'password123');

    await expect(verifier.verify('wrongpass', encoded)).resolves.toBe(false);
    await expect(verifier.verify('', encoded)).resolves.toBe(false);
    await expect(verifier.verify('password1234', encoded)).resolves.toBe(false);
  });

  it('decodes back to the parameters in effect at encode time', async () => {
    const { encoder } = buildTestCredentials();
    const encoded = await encoder.encode('argon2id', 'password123');

    const decoded = decodeBuiltin(encoded);
    expect(decoded.algorithm).toBe('argon2id');
    expect(decoded.params).toEqual({
      memoryCostKiB: 4096,
      iterations: 2,
      parallelism: 1,
      saltLength: 16,
      keyLength: 32,
    });
  });

  it('uses the configured salt and key lengths', async () => {
    const { encoder, verifier } = buildTestCredentials({
      env: makeTestEnv({ ARGON2ID_SALT_LENGTH: '8', ARGON2ID_KEY_LENGTH: '16' }),
    });
    const encoded = await encoder.encode('argon2id', 'password123');

    const decoded = decodeBuiltin(encoded);
    expect(decoded.salt.length).toBe(8);
    expect(decoded.hash.length).toBe(16);
    await expect(verifier.verify('password123', encoded)).resolves.toBe(true);
  });

  it('picks up a configuration change on the next call', async () => {
    const { encoder, env } = buildTestCredentials();

    const before = await encoder.encode('argon2id', 'password123');
    env.ARGON2ID_ITERATIONS = '3';
    const after = await encoder.encode('argon2id', 'password123');

    expect(decodeBuiltin(before).params).toMatchObject({ iterations: 2 });
    expect(decodeBuiltin(after).params).toMatchObject({ iterations: 3 });
  });

  it('hashes made under old parameters still verify after a change', async () => {
    const { encoder, verifier, env } = buildTestCredentials();

    const encoded = await encoder.encode('argon2id', 'password123');
    env.ARGON2ID_MEMORY = '8192';

    await expect(verifier.verify('password123', encoded)).resolves.toBe(true);
  });

  it('two encodings of the same password both verify', async () => {
    const { encoder, verifier } = buildTestCredentials();

    const first = await encoder.encode('argon2id', 'password123');
    const second = await encoder.encode('argon2id', 'password123');

    await expect(verifier.verify('password123', first)).resolves.toBe(true);
    await expect(verifier.verify('password123', second)).resolves.toBe(true);
  });

  it('handles non-ASCII passwords', async () => {
    const { encoder, verifier } = buildTestCredentials();
    const encoded = await encoder.encode('argon2id', 'pässwörd-🔑');

    await expect(verifier.verify('pässwörd-🔑', encoded)).resolves.toBe(true);
    await expect(verifier.verify('passwörd-🔑', encoded)).resolves.toBe(false);
  });

  it('tampered hash bytes => false', async () => {
    const { encoder, verifier } = buildTestCredentials();
    const encoded = await encoder.encode('argon2id', 'password123');

    const parts = segments(encoded);
    const tampered = [...parts.slice(0, 4), flipBase64Char(parts[4] ?? '', 0)].join('$');

    expect(tampered).not.toBe(encoded);
    await expect(verifier.verify('password123', tampered)).resolves.toBe(false);
  });

  it('tampered salt bytes => false', async () => {
    const { encoder, verifier } = buildTestCredentials();
    const encoded = await encoder.encode('argon2id', 'password123');

    const parts = segments(encoded);
    const tampered = [...parts.slice(0, 3), flipBase64Char(parts[3] ?? '', 0), parts[4]].join('$');

    await expect(verifier.verify('password123', tampered)).resolves.toBe(false);
  });

  it('tampered delimiter => FormatError', async () => {
    const { encoder, verifier } = buildTestCredentials();
    const encoded = await encoder.encode('argon2id', 'password123');

    const lastDelimiter = encoded.lastIndexOf('$');
    const tampered = `${encoded.slice(0, lastDelimiter)},${encoded.slice(lastDelimiter + 1)}`;

    await expect(verifier.verify('password123', tampered)).rejects.toBeInstanceOf(FormatError);
  });

  it('invalid configuration => ConfigurationError from encode', async () => {
    const { encoder } = buildTestCredentials({
      env: makeTestEnv({ ARGON2ID_MEMORY: undefined }),
    });

    await expect(encoder.encode('argon2id', 'password123')).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('memory below 1024 KiB is a ConfigurationError, not a derivation failure', async () => {
    const { encoder } = buildTestCredentials({
      env: makeTestEnv({ ARGON2ID_MEMORY: '8', ARGON2ID_ITERATIONS: '1' }),
    });

    const err = await encoder.encode('argon2id', 'password123').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toMatchObject({ code: 'CONFIGURATION_ERROR', field: 'ARGON2ID_MEMORY' });
  });

  it('verify does not need configuration', async () => {
    const { encoder, verifier, env } = buildTestCredentials();
    const encoded = await encoder.encode('argon2id', 'password123');

    delete env.ARGON2ID_MEMORY;

    await expect(verifier.verify('password123', encoded)).resolves.toBe(true);
  });
});
