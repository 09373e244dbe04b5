/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * NOT HERE:
 * - Argon2id / bcrypt tunables. Those are resolved per call by the credentials
 *   ParameterStore so a changed value is picked up by the next hash without a restart.
 */

import 'dotenv/config';
import { z } from 'zod';
import type { AlgorithmName } from '../modules/credentials';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('credential-hasher'),

  // Algorithm used for new hashes. Checked against the registry in di.ts.
  PASSWORD_HASH_ALGORITHM: z.string().min(1).default('argon2id'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;

  logLevel: string;
  serviceName: string;

  passwordHashAlgorithm: AlgorithmName;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    passwordHashAlgorithm: parsed.PASSWORD_HASH_ALGORITHM,
  };
}
