/**
 * src/shared/security/constant-time.ts
 *
 * WHY:
 * - Comparing derived key bytes with `===` or a byte loop that returns early
 *   leaks, through timing, how many leading bytes matched.
 *
 * HOW TO USE:
 * - if (constantTimeEqual(expected, actual)) { ... }
 *
 * RULES:
 * - Never compare lengths first and return; a length mismatch still runs a full
 *   timingSafeEqual (against the input itself) before answering false.
 */

import { timingSafeEqual } from 'node:crypto';

export function constantTimeEqual(expected: Uint8Array, actual: Uint8Array): boolean {
  const sameLength = expected.length === actual.length;
  const other = sameLength ? actual : expected;

  const equal = timingSafeEqual(expected, other);
  return sameLength && equal;
}
