/**
 * src/modules/credentials/policies/needs-rehash.policy.ts
 *
 * WHY:
 * - After a successful login, a stored hash made with an older algorithm or
 *   weaker parameters should be replaced by a fresh one.
 * - Pure decision: decoded stored hash + currently preferred target → boolean.
 *
 * RULES:
 * - Any difference in a target parameter counts, including salt/key length and
 *   parameters that were LOWERED, so the store converges on exactly what is configured.
 * - Works for any registered algorithm: parameters are compared by name.
 */

import type { DecodedHash, ResolvedParameters } from '../credential.types';

export function decideNeedsRehash(input: {
  decoded: DecodedHash;
  target: ResolvedParameters;
}): boolean {
  const { decoded, target } = input;

  if (decoded.algorithm !== target.algorithm) return true;

  return Object.entries(target.params).some(([key, value]) => decoded.params[key] !== value);
}
