/**
 * src/shared/logger/logger.ts
 *
 * JSON logs on stderr; stdout belongs to CLI output (hashes, verdicts).
 * Modules take a `Logger` from the composition root. Pass errors as `{ err }`.
 * Never log plaintext passwords or encoded hashes.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'credential-hasher';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});

export type Logger = winston.Logger;
