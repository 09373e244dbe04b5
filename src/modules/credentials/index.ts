/**
 * src/modules/credentials/index.ts
 *
 * Public surface of the credentials module. Other code imports from here, not
 * from /encoding or /algorithms directly. The grammar helpers are exported for
 * algorithms added through registry.extend().
 */

export { createCredentialModule, createBuiltinRegistry } from './credential.module';
export type { CredentialModule } from './credential.module';
export { CredentialService } from './credential.service';
export { CredentialEncoder } from './credential.encoder';
export { CredentialVerifier } from './credential.verifier';
export { decodeHash } from './credential.decoder';
export { AlgorithmRegistry } from './credential.registry';
export { EnvParameterStore } from './credential.params';
export type { ParameterStore, EnvSource } from './credential.params';
export type { HashAlgorithm } from './algorithms/hash-algorithm';
export type { ParsedHash } from './encoding/hash-format';
export type { Malformed } from './encoding/param-string';
export { malformed, readParam, splitParams } from './encoding/param-string';
export { decodeRawBase64Strict, encodeRawBase64 } from './encoding/base64';
export { decideNeedsRehash } from './policies/needs-rehash.policy';
export {
  CredentialError,
  ConfigurationError,
  UnsupportedAlgorithmError,
  FormatError,
  IncompatibilityError,
  CryptoFailure,
  PasswordTooLongError,
  isCredentialError,
} from './credential.errors';
export type { CredentialErrorCode } from './credential.errors';
export type {
  AlgorithmName,
  AlgorithmParameters,
  Argon2idDecodedHash,
  Argon2idParameters,
  BcryptDecodedHash,
  BcryptParameters,
  BuiltinAlgorithm,
  DecodedHash,
  EncodedHash,
  ParameterValues,
  ResolvedParameters,
} from './credential.types';
