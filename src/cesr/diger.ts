/**
 * CESR Diger - Digest/SAID generation
 *
 * Creates cryptographic digests encoded in CESR format
 */

import { blake3 } from '@noble/hashes/blake3.js';
import { blake2b, blake2s } from '@noble/hashes/blake2.js';
import { sha256, sha512 } from '@noble/hashes/sha2.js';
import { sha3_256, sha3_512 } from '@noble/hashes/sha3.js';
import { DigDex, digestCodeOf, digestSizage, isDigestCode, type DigestCode } from './codex.js';
import { arraysEqual, decodeQb64, encodeQb64, textToBytes } from './utils.js';
import { err } from '../errors';

export interface DigerParams {
  /** Serialization to digest */
  ser?: Uint8Array | string;
  /** Existing qb64 digest to wrap */
  qb64?: string;
  /** Digest algorithm code (default: Blake3-256) */
  code?: DigestCode;
}

/**
 * Diger - Cryptographic digest primitive
 *
 * Computes and verifies cryptographic digests (SAIDs)
 */
export class Diger {
  private readonly _code: DigestCode;
  private readonly _raw: Uint8Array;

  constructor(params: DigerParams) {
    if (params.qb64 !== undefined) {
      const code = digestCodeOf(params.qb64);
      if (!isDigestCode(code)) {
        throw err.UnknownAlgorithm(params.qb64);
      }
      const sizage = digestSizage(code);
      if (params.qb64.length !== sizage.fs) {
        throw err.InvalidField('d', `expected ${sizage.fs} characters for code ${code}, got ${params.qb64.length}`);
      }
      if (!/^[A-Za-z0-9_-]+$/.test(params.qb64)) {
        throw err.InvalidField('d', 'not a base64url string');
      }
      this._code = code;
      this._raw = decodeQb64(params.qb64, sizage.hs);
    } else if (params.ser !== undefined) {
      this._code = params.code ?? DigDex.Blake3_256;
      this._raw = Diger._digest(toBytes(params.ser), this._code);
    } else {
      throw new Error('Either ser or qb64 must be provided');
    }
  }

  get code(): DigestCode {
    return this._code;
  }

  get raw(): Uint8Array {
    return this._raw.slice();
  }

  get qb64(): string {
    return encodeQb64(this._raw, this._code);
  }

  /**
   * Compute cryptographic digest
   *
   * @param ser - Serialized data to digest
   * @param code - Digest algorithm code
   * @returns Raw digest bytes
   */
  static _digest(ser: Uint8Array, code: DigestCode): Uint8Array {
    switch (code) {
      case DigDex.Blake3_256:
        return blake3(ser, { dkLen: 32 });

      case DigDex.Blake3_512:
        return blake3(ser, { dkLen: 64 });

      case DigDex.Blake2b_256:
        return blake2b(ser, { dkLen: 32 });

      case DigDex.Blake2b_512:
        return blake2b(ser, { dkLen: 64 });

      case DigDex.Blake2s_256:
        return blake2s(ser, { dkLen: 32 });

      case DigDex.SHA3_256:
        return sha3_256(ser);

      case DigDex.SHA3_512:
        return sha3_512(ser);

      case DigDex.SHA2_256:
        return sha256(ser);

      case DigDex.SHA2_512:
        return sha512(ser);
    }
  }

  /**
   * Verify that this digest matches a serialization
   */
  verify(ser: Uint8Array | string): boolean {
    return arraysEqual(Diger._digest(toBytes(ser), this._code), this._raw);
  }

  /**
   * Compare against a qb64 SAID
   */
  compare(said: string): boolean {
    return this.qb64 === said;
  }
}

/**
 * Generate a cryptographic digest
 *
 * @returns CESR-encoded digest string
 */
export function diger(ser: Uint8Array | string, code: DigestCode = DigDex.Blake3_256): string {
  return new Diger({ ser, code }).qb64;
}

function toBytes(ser: Uint8Array | string): Uint8Array {
  return typeof ser === 'string' ? textToBytes(ser) : ser;
}
