/**
 * src/modules/credentials/credential.types.ts
 *
 * WHY:
 * - One place for the value types that flow between the parameter store,
 *   the encoding grammar, the algorithms and the verifier.
 *
 * RULES:
 * - Plain readonly data. No behaviour, no Node APIs beyond Buffer.
 */

export type BuiltinAlgorithm = 'argon2id' | 'bcrypt';

/** Registry keys are open-ended; the built-ins are just the ones shipped here. */
export type AlgorithmName = BuiltinAlgorithm | (string & {});

/** Named integer tunables, as stored in an encoded hash's parameter segment. */
export type ParameterValues = Readonly<Record<string, number>>;

export type Argon2idParameters = Readonly<{
  memoryCostKiB: number;
  iterations: number;
  parallelism: number;
  saltLength: number;
  keyLength: number;
}>;

export type BcryptParameters = Readonly<{
  cost: number;
}>;

export type AlgorithmParameters =
  | Readonly<{ algorithm: 'argon2id'; params: Argon2idParameters }>
  | Readonly<{ algorithm: 'bcrypt'; params: BcryptParameters }>;

/** What an algorithm would use for a new hash right now. */
export type ResolvedParameters = Readonly<{ algorithm: AlgorithmName; params: ParameterValues }>;

export type Argon2idDecodedHash = Readonly<{
  algorithm: 'argon2id';
  version: number;
  params: Argon2idParameters;
  salt: Buffer;
  hash: Buffer;
}>;

/**
 * bcrypt keeps its salt inside its own "$2b$..." string, so `salt` is always
 * empty and `hash` holds that whole string as bytes.
 */
export type BcryptDecodedHash = Readonly<{
  algorithm: 'bcrypt';
  params: BcryptParameters;
  salt: Buffer;
  hash: Buffer;
}>;

/**
 * Structural view of any encoded hash. The built-in algorithms narrow it to
 * Argon2idDecodedHash / BcryptDecodedHash; `version` is set only by grammars
 * that carry one.
 */
export type DecodedHash = Readonly<{
  algorithm: AlgorithmName;
  version?: number;
  params: ParameterValues;
  salt: Buffer;
  hash: Buffer;
}>;

/** An encoded hash string as produced by `encode` and stored by callers. */
export type EncodedHash = string;
