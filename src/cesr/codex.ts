/**
 * CESR Codex - Derivation codes and size tables
 *
 * Only the codes an ACDC needs: digests (for SAIDs) and the 128-bit salt
 * used to blind private attribute blocks.
 */

/**
 * Sizage - Size parameters for a derivation code
 *
 * @property hs - Hard size: number of chars in the code (1 or 2)
 * @property fs - Full size: total size in chars, code included
 * @property rs - Raw size: number of bytes of raw material
 */
export interface Sizage {
  hs: number;
  fs: number;
  rs: number;
}

/**
 * DigDex - Digest derivation codes
 */
export class DigDex {
  static readonly Blake3_256 = 'E';          // Blake3 256 bit digest
  static readonly Blake2b_256 = 'F';         // Blake2b 256 bit digest
  static readonly Blake2s_256 = 'G';         // Blake2s 256 bit digest
  static readonly SHA3_256 = 'H';            // SHA3 256 bit digest
  static readonly SHA2_256 = 'I';            // SHA2 256 bit digest
  static readonly Blake3_512 = '0D';         // Blake3 512 bit digest
  static readonly Blake2b_512 = '0E';        // Blake2b 512 bit digest
  static readonly SHA3_512 = '0F';           // SHA3 512 bit digest
  static readonly SHA2_512 = '0G';           // SHA2 512 bit digest
}

export type DigestCode =
  | typeof DigDex.Blake3_256
  | typeof DigDex.Blake2b_256
  | typeof DigDex.Blake2s_256
  | typeof DigDex.SHA3_256
  | typeof DigDex.SHA2_256
  | typeof DigDex.Blake3_512
  | typeof DigDex.Blake2b_512
  | typeof DigDex.SHA3_512
  | typeof DigDex.SHA2_512;

/**
 * SaltDex - Salt derivation codes
 */
export class SaltDex {
  static readonly Salt_128 = '0A';           // Salt 128 bits
}

const DIGEST_SIZES: Readonly<Record<DigestCode, Sizage>> = {
  [DigDex.Blake3_256]: { hs: 1, fs: 44, rs: 32 },
  [DigDex.Blake2b_256]: { hs: 1, fs: 44, rs: 32 },
  [DigDex.Blake2s_256]: { hs: 1, fs: 44, rs: 32 },
  [DigDex.SHA3_256]: { hs: 1, fs: 44, rs: 32 },
  [DigDex.SHA2_256]: { hs: 1, fs: 44, rs: 32 },
  [DigDex.Blake3_512]: { hs: 2, fs: 88, rs: 64 },
  [DigDex.Blake2b_512]: { hs: 2, fs: 88, rs: 64 },
  [DigDex.SHA3_512]: { hs: 2, fs: 88, rs: 64 },
  [DigDex.SHA2_512]: { hs: 2, fs: 88, rs: 64 },
};

export const SALT_SIZE: Sizage = { hs: 2, fs: 24, rs: 16 };

export function isDigestCode(code: string): code is DigestCode {
  return Object.prototype.hasOwnProperty.call(DIGEST_SIZES, code);
}

export function digestSizage(code: DigestCode): Sizage {
  return DIGEST_SIZES[code];
}

/**
 * Extract the derivation code from the front of a qb64 digest.
 * Codes starting with '0' are two characters wide.
 */
export function digestCodeOf(qb64: string): string {
  return qb64.startsWith('0') ? qb64.slice(0, 2) : qb64.slice(0, 1);
}
