/**
 * CESR Utility Functions
 *
 * Base64 encoding/decoding and byte helpers for CESR primitives
 */

// Base64 URL-safe alphabet (RFC 4648)
export const B64_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

const B64_IDX_BY_CHR = new Map<string, number>();
for (let i = 0; i < B64_CHARS.length; i++) {
  B64_IDX_BY_CHR.set(B64_CHARS.charAt(i), i);
}

/**
 * Encode Uint8Array to URL-safe Base64 string (no padding)
 */
export function encodeB64(data: Uint8Array): string {
  let result = '';
  let bits = 0;
  let value = 0;

  for (const byte of data) {
    value = ((value << 8) | byte) & 0xffff;
    bits += 8;

    while (bits >= 6) {
      const index = (value >>> (bits - 6)) & 0x3f;
      result += B64_CHARS.charAt(index);
      bits -= 6;
    }
  }

  // Handle remaining bits
  if (bits > 0) {
    const index = (value << (6 - bits)) & 0x3f;
    result += B64_CHARS.charAt(index);
  }

  return result;
}

/**
 * Decode URL-safe Base64 string to Uint8Array (handles missing padding)
 */
export function decodeB64(text: string): Uint8Array {
  let bits = 0;
  let value = 0;
  const result: number[] = [];

  for (const char of text) {
    const index = B64_IDX_BY_CHR.get(char);

    if (index === undefined) {
      throw new Error(`Invalid Base64 character: ${char}`);
    }

    value = ((value << 6) | index) & 0xffff;
    bits += 6;

    if (bits >= 8) {
      result.push((value >>> (bits - 8)) & 0xff);
      bits -= 8;
    }
  }

  return new Uint8Array(result);
}

/**
 * Encode raw bytes as qb64 with a fixed-size code
 *
 * 1. Pad size ps = (3 - (raw.length % 3)) % 3
 * 2. Prepend ps zero bytes to raw
 * 3. Base64url encode the padded bytes
 * 4. Replace the first code.length characters with the code
 */
export function encodeQb64(raw: Uint8Array, code: string): string {
  const ps = (3 - (raw.length % 3)) % 3;
  const padded = new Uint8Array(ps + raw.length);
  padded.set(raw, ps);

  return code + encodeB64(padded).slice(code.length);
}

/**
 * Decode qb64 back to raw bytes, given the width of its code
 */
export function decodeQb64(qb64: string, hs: number): Uint8Array {
  const padded = decodeB64('A'.repeat(hs) + qb64.slice(hs));
  return padded.slice(hs);
}

/**
 * Convert string to Uint8Array (UTF-8)
 */
export function textToBytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Convert Uint8Array to string (UTF-8)
 */
export function bytesToText(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

/**
 * Compare two Uint8Arrays for equality
 */
export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }

  return true;
}

/**
 * Index of the first occurrence of needle in haystack, or -1
 */
export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array, from: number = 0): number {
  if (needle.length === 0) return from;

  outer:
  for (let i = from; i <= haystack.length - needle.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }

  return -1;
}
