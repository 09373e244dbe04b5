/**
 * src/modules/credentials/encoding/param-string.ts
 *
 * WHY:
 * - Parameter segments look like `v=19,m=65536,t=3,p=2` or `c=12`.
 * - Each algorithm reads its own keys, in its own fixed order, through readParam()
 *   so a short or reordered segment is reported with the key that is wrong.
 *
 * RULES:
 * - Values are canonical decimals (no sign, no leading zeros, no whitespace),
 *   which keeps decode → format byte-identical.
 */

import { PARAM_SEPARATOR } from '../credential.constants';

export type Malformed = Readonly<{
  kind: 'malformed';
  field: string;
  reason: string;
}>;

const CANONICAL_DECIMAL = /^(0|[1-9]\d*)$/;

export function malformed(field: string, reason: string): Malformed {
  return { kind: 'malformed', field, reason };
}

export function splitParams(segment: string): string[] {
  return segment.split(PARAM_SEPARATOR);
}

export function readParam(
  part: string | undefined,
  key: string,
  bounds: Readonly<{ min: number; max: number }>,
): number | Malformed {
  if (part === undefined) {
    return malformed(key, `missing "${key}" parameter`);
  }

  const eq = part.indexOf('=');
  if (eq === -1 || part.slice(0, eq) !== key) {
    return malformed(key, `expected "${key}=<integer>"`);
  }

  const raw = part.slice(eq + 1);
  if (!CANONICAL_DECIMAL.test(raw)) {
    return malformed(key, `"${key}" is not a decimal integer`);
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < bounds.min || value > bounds.max) {
    return malformed(key, `"${key}" is out of range [${bounds.min}, ${bounds.max}]`);
  }

  return value;
}
