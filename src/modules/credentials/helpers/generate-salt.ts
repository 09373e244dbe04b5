/**
 * src/modules/credentials/helpers/generate-salt.ts
 *
 * WHY:
 * - Every hash gets a fresh salt from the OS CSPRNG.
 * - A failing random source must stop the call (CryptoFailure), never fall
 *   back to something weaker or retry in a loop.
 */

import { randomBytes } from 'node:crypto';
import { CryptoFailure } from '../credential.errors';

export function generateSalt(length: number): Buffer {
  try {
    return randomBytes(length);
  } catch (err: unknown) {
    throw new CryptoFailure('Secure random source failed to produce a salt.', {
      field: 'salt',
      meta: { length },
      cause: err,
    });
  }
}
