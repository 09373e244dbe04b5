import { describe, it, expect } from 'vitest';
import {
  AlgorithmRegistry,
  CredentialVerifier,
  FormatError,
  IncompatibilityError,
  UnsupportedAlgorithmError,
  type HashAlgorithm,
} from '../../../src/modules/credentials';
import {
  buildTestCredentials,
  KNOWN_ARGON2ID_HASH,
  KNOWN_BCRYPT_HASH,
} from '../../helpers/credential-test-helpers';

describe('CredentialVerifier', () => {
  const { verifier, registry } = buildTestCredentials();

  it.each(['', 'not-a-valid-hash', '$', '$bcrypt', '$argon2id', 'plaintext$hash$x'])(
    'too-short or malformed input %j => FormatError',
    async (encoded) => {
      await expect(verifier.verify('password123', encoded)).rejects.toBeInstanceOf(FormatError);
    },
  );

  it('unregistered algorithm tag => UnsupportedAlgorithmError', async () => {
    await expect(
      verifier.verify('password123', '$scrypt$ln=15,r=8,p=1$c2FsdHNhbHQ$aGFzaA'),
    ).rejects.toBeInstanceOf(UnsupportedAlgorithmError);
  });

  it('unsupported argon2 version => IncompatibilityError, never true/false', async () => {
    const v16 = KNOWN_ARGON2ID_HASH.replace('v=19', 'v=16');

    await expect(verifier.verify('password123', v16)).rejects.toBeInstanceOf(
      IncompatibilityError,
    );
  });

  it('dispatches on the tag in the encoded string', async () => {
    const calls: string[] = [];
    const spy = (name: string): HashAlgorithm => ({
      name,
      encode: () => Promise.reject(new Error('not used')),
      parse: (fields) => registry.lookup(name).parse(fields),
      currentParameters: () => ({}),
      verify: (_password, decoded) => {
        calls.push(`${name}:${decoded.algorithm}`);
        return Promise.resolve(true);
      },
    });

    const spying = new CredentialVerifier(AlgorithmRegistry.of([spy('argon2id'), spy('bcrypt')]));

    await spying.verify('x', KNOWN_BCRYPT_HASH);
    await spying.verify('x', KNOWN_ARGON2ID_HASH);

    expect(calls).toEqual(['bcrypt:bcrypt', 'argon2id:argon2id']);
  });

  it('algorithm is looked up before the rest is parsed', async () => {
    const withoutBcrypt = new CredentialVerifier(
      AlgorithmRegistry.of([registry.lookup('argon2id')]),
    );

    await expect(withoutBcrypt.verify('x', '$bcrypt$c=4$!!')).rejects.toBeInstanceOf(
      UnsupportedAlgorithmError,
    );
  });
});
