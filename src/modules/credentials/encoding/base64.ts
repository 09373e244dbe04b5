/**
 * src/modules/credentials/encoding/base64.ts
 *
 * Standard alphabet, no padding ("raw std" base64), decoded strictly.
 *
 * Buffer.from(str, 'base64') is lenient: it skips unknown characters, accepts
 * '-'/'_' and ignores non-zero trailing bits. The strict decoder rejects all of
 * that by requiring the input to be the exact canonical encoding of its bytes.
 */

const RAW_STD_BASE64 = /^[A-Za-z0-9+/]*$/;

export function encodeRawBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64').replace(/=+$/, '');
}

/** Returns null when `value` is not canonical unpadded standard base64. */
export function decodeRawBase64Strict(value: string): Buffer | null {
  if (!RAW_STD_BASE64.test(value) || value.length % 4 === 1) return null;

  const bytes = Buffer.from(value, 'base64');
  return encodeRawBase64(bytes) === value ? bytes : null;
}
