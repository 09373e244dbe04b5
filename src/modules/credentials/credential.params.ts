/**
 * src/modules/credentials/credential.params.ts
 *
 * WHY:
 * - Algorithms read their tunables from configuration on EVERY call, so an
 *   operator can raise the Argon2id memory cost or the bcrypt cost and the next
 *   hash picks it up without a restart.
 * - Invalid cryptographic parameters are a security defect, so nothing here has
 *   a default: a missing or out-of-range value is a ConfigurationError.
 *
 * HOW TO USE:
 * - const store = new EnvParameterStore()            // reads process.env
 * - const store = new EnvParameterStore(() => env)   // tests / custom sources
 * - store.resolveArgon2id() / store.resolveBcrypt() / store.resolve('argon2id')
 */

import { z } from 'zod';
import {
  ARGON2ID_LIMITS,
  BCRYPT_MAX_COST,
  BCRYPT_MIN_COST,
  UINT32_MAX,
} from './credential.constants';
import { ConfigurationError, UnsupportedAlgorithmError } from './credential.errors';
import type {
  AlgorithmParameters,
  Argon2idParameters,
  BcryptParameters,
} from './credential.types';

export type EnvSource = () => Readonly<Record<string, string | undefined>>;

export interface ParameterStore {
  resolve(algorithm: string): AlgorithmParameters;
  resolveArgon2id(): Argon2idParameters;
  resolveBcrypt(): BcryptParameters;
}

const ARGON2ID_ENV = {
  memoryCostKiB: 'ARGON2ID_MEMORY',
  iterations: 'ARGON2ID_ITERATIONS',
  parallelism: 'ARGON2ID_PARALLELISM',
  saltLength: 'ARGON2ID_SALT_LENGTH',
  keyLength: 'ARGON2ID_KEY_LENGTH',
} as const;

const BCRYPT_ENV = {
  cost: 'BCRYPT_COST',
} as const;

function integerVar(min: number, max: number) {
  return z
    .string({ required_error: 'is required' })
    .trim()
    .regex(/^\d+$/, 'must be a base-10 integer')
    .transform(Number)
    .pipe(
      z
        .number()
        .int()
        .min(min, `must be >= ${min}`)
        .max(max, `must be <= ${max}`),
    );
}

const Argon2idEnvSchema = z
  .object({
    [ARGON2ID_ENV.memoryCostKiB]: integerVar(ARGON2ID_LIMITS.minMemoryKiB, UINT32_MAX),
    [ARGON2ID_ENV.iterations]: integerVar(ARGON2ID_LIMITS.minIterations, UINT32_MAX),
    [ARGON2ID_ENV.parallelism]: integerVar(
      ARGON2ID_LIMITS.minParallelism,
      ARGON2ID_LIMITS.maxParallelism,
    ),
    [ARGON2ID_ENV.saltLength]: integerVar(ARGON2ID_LIMITS.minSaltLength, UINT32_MAX),
    [ARGON2ID_ENV.keyLength]: integerVar(ARGON2ID_LIMITS.minKeyLength, UINT32_MAX),
  })
  .superRefine((vals, ctx) => {
    // libargon2 also needs 8 KiB per lane, which only bites above 128 lanes.
    const minMemory = ARGON2ID_LIMITS.minMemoryPerLane * vals[ARGON2ID_ENV.parallelism];
    if (vals[ARGON2ID_ENV.memoryCostKiB] < minMemory) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [ARGON2ID_ENV.memoryCostKiB],
        message: `must be >= ${minMemory} (8 KiB per lane)`,
      });
    }
  });

const BcryptEnvSchema = z.object({
  [BCRYPT_ENV.cost]: integerVar(BCRYPT_MIN_COST, BCRYPT_MAX_COST),
});

function toConfigurationError(algorithm: string, error: z.ZodError): ConfigurationError {
  const fields = [...new Set(error.issues.map((issue) => String(issue.path[0] ?? 'unknown')))];
  const first = error.issues[0];
  const field = fields[0] ?? 'unknown';
  const reason = first ? first.message : 'is invalid';

  return new ConfigurationError(`${algorithm} misconfigured: ${field} ${reason}.`, {
    field,
    meta: { algorithm, fields },
  });
}

export class EnvParameterStore implements ParameterStore {
  constructor(private readonly source: EnvSource = () => process.env) {}

  resolve(algorithm: string): AlgorithmParameters {
    switch (algorithm) {
      case 'argon2id':
        return { algorithm: 'argon2id', params: this.resolveArgon2id() };
      case 'bcrypt':
        return { algorithm: 'bcrypt', params: this.resolveBcrypt() };
      default:
        throw new UnsupportedAlgorithmError(algorithm);
    }
  }

  resolveArgon2id(): Argon2idParameters {
    const parsed = Argon2idEnvSchema.safeParse(this.source());
    if (!parsed.success) {
      throw toConfigurationError('argon2id', parsed.error);
    }

    const vals = parsed.data;
    return Object.freeze({
      memoryCostKiB: vals[ARGON2ID_ENV.memoryCostKiB],
      iterations: vals[ARGON2ID_ENV.iterations],
      parallelism: vals[ARGON2ID_ENV.parallelism],
      saltLength: vals[ARGON2ID_ENV.saltLength],
      keyLength: vals[ARGON2ID_ENV.keyLength],
    });
  }

  resolveBcrypt(): BcryptParameters {
    const parsed = BcryptEnvSchema.safeParse(this.source());
    if (!parsed.success) {
      throw toConfigurationError('bcrypt', parsed.error);
    }

    return Object.freeze({ cost: parsed.data[BCRYPT_ENV.cost] });
  }
}
