/**
 * src/modules/credentials/credential.errors.ts
 *
 * WHY:
 * - Callers must be able to tell "bad configuration" from "bad stored hash" from
 *   "hash from a newer Argon2 version" without parsing messages.
 * - "Password does not match" is NOT an error; verify() returns false for it.
 *
 * RULES:
 * - Never put the plaintext password or hash bytes in message or meta.
 * - `field` names the env var or the encoded-hash segment at fault, for logging.
 */

export const CREDENTIAL_ERROR_CODES = [
  'CONFIGURATION_ERROR',
  'UNSUPPORTED_ALGORITHM',
  'FORMAT_ERROR',
  'INCOMPATIBLE_VERSION',
  'CRYPTO_FAILURE',
  'PASSWORD_TOO_LONG',
] as const;

export type CredentialErrorCode = (typeof CREDENTIAL_ERROR_CODES)[number];
export type CredentialErrorMeta = Record<string, unknown>;

type CredentialErrorOptions = {
  field?: string;
  meta?: CredentialErrorMeta;
  cause?: unknown;
};

export abstract class CredentialError extends Error {
  abstract readonly code: CredentialErrorCode;
  readonly field?: string;
  readonly meta?: CredentialErrorMeta;

  protected constructor(message: string, opts: CredentialErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.field = opts.field;
    this.meta = opts.meta;
  }
}

/** A required tunable is missing, not an integer, or outside the algorithm's range. */
export class ConfigurationError extends CredentialError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string, opts: CredentialErrorOptions = {}) {
    super(message, opts);
  }
}

export class UnsupportedAlgorithmError extends CredentialError {
  readonly code = 'UNSUPPORTED_ALGORITHM';
  readonly algorithm: string;

  constructor(algorithm: string) {
    super(`Algorithm "${algorithm}" is not supported.`, { field: 'algorithm' });
    this.algorithm = algorithm;
  }
}

/** The encoded hash is structurally invalid. Never used for a wrong password. */
export class FormatError extends CredentialError {
  readonly code = 'FORMAT_ERROR';

  constructor(message: string, opts: CredentialErrorOptions = {}) {
    super(message, opts);
  }
}

/** Well-formed hash produced by an algorithm version this build does not implement. */
export class IncompatibilityError extends CredentialError {
  readonly code = 'INCOMPATIBLE_VERSION';
  readonly supportedVersion: number;
  readonly foundVersion: number;

  constructor(opts: { algorithm: string; supportedVersion: number; foundVersion: number }) {
    super(
      `Incompatible ${opts.algorithm} version ${opts.foundVersion} (supported: ${opts.supportedVersion}).`,
      { field: 'version', meta: { algorithm: opts.algorithm } },
    );
    this.supportedVersion = opts.supportedVersion;
    this.foundVersion = opts.foundVersion;
  }
}

/** The random source or the derivation primitive failed. Not retried. */
export class CryptoFailure extends CredentialError {
  readonly code = 'CRYPTO_FAILURE';

  constructor(message: string, opts: CredentialErrorOptions = {}) {
    super(message, opts);
  }
}

export class PasswordTooLongError extends CredentialError {
  readonly code = 'PASSWORD_TOO_LONG';

  constructor(opts: { algorithm: string; maxBytes: number }) {
    super(`Password exceeds ${opts.maxBytes} bytes, the ${opts.algorithm} input limit.`, {
      field: 'password',
      meta: { algorithm: opts.algorithm, maxBytes: opts.maxBytes },
    });
  }
}

export function isCredentialError(err: unknown): err is CredentialError {
  return err instanceof CredentialError;
}
