/**
 * Salt generation for private attribute blocks
 */

import { randomBytes } from '@noble/hashes/utils.js';
import { SALT_SIZE, SaltDex } from './codex.js';
import { encodeQb64 } from './utils.js';

/**
 * Generate a random 128-bit salt in qb64 (24 chars, '0A' prefix)
 *
 * @param raw - Optional fixed salt material (16 bytes) for deterministic tests
 */
export function salt(raw: Uint8Array = randomBytes(SALT_SIZE.rs)): string {
  if (raw.length !== SALT_SIZE.rs) {
    throw new Error(`Salt must be exactly ${SALT_SIZE.rs} bytes`);
  }
  return encodeQb64(raw, SaltDex.Salt_128);
}
