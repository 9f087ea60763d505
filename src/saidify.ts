/**
 * SAID (Self-Addressing IDentifier) engine
 *
 * A container's identifier is a digest over its own serialization, and that
 * serialization carries its own byte size in the version header. Both are
 * resolved with a placeholder of the identifier's final length:
 *
 * 1. Put '#' * fs in the SAID field (fs = full size of the digest code)
 * 2. Serialize with size 0 to learn the byte length
 * 3. Re-serialize with the real size (the size field has a fixed width)
 * 4. Digest those bytes and encode as CESR: code + base64url(digest)
 * 5. Swap the placeholder for the SAID; the length does not change
 */

import { digestCodeOf, digestSizage, isDigestCode, DigDex, type DigestCode } from './cesr/codex';
import { Diger, diger } from './cesr/diger';
import { indexOfBytes, textToBytes } from './cesr/utils';
import { serialize, deserialize } from './serder';
import { versify, sniff, Kind, Protocol, VERSION_1_0, type Version, type VersionHeader } from './versify';
import { err, isAcdcError } from './errors';
import { ok, fail, s, type JsonObject, type Result, type SAID } from './types';

export const PLACEHOLDER_CHAR = '#';

/**
 * Placeholder of exactly the encoded length of a digest code
 */
export function placeholder(code: DigestCode): string {
  return PLACEHOLDER_CHAR.repeat(digestSizage(code).fs);
}

/**
 * Saidify options
 */
export interface SaidifyOptions {
  /** Field label for the SAID (default: "d") */
  label?: string;
  /** Digest code (default: "E", Blake3-256) */
  code?: DigestCode;
  /** Serialization kind (default: JSON) */
  kind?: Kind;
}

export interface IdentifierOptions {
  code?: DigestCode;
  kind?: Kind;
  version?: Version;
}

/**
 * A finalized container serialization
 */
export interface Identified {
  raw: Uint8Array;
  said: SAID;
  sad: JsonObject;
}

/**
 * A container serialization whose identifier checked out
 */
export interface Verified {
  said: SAID;
  header: VersionHeader;
  sad: JsonObject;
}

/**
 * Compute the identifier of a top-level field map
 *
 * The map must already hold the 'v' and 'd' labels in their final
 * positions; their values are replaced.
 *
 * @returns Final bytes, the SAID and the finalized field map
 */
export function computeIdentifier(sad: JsonObject, options: IdentifierOptions = {}): Identified {
  const code = options.code ?? DigDex.Blake3_256;
  const kind = options.kind ?? Kind.JSON;
  const version = options.version ?? VERSION_1_0;

  if (!('v' in sad) || !('d' in sad)) {
    throw err.InvalidField('v', 'field map needs v and d labels');
  }

  const dummy: JsonObject = { ...sad, v: versify(Protocol.ACDC, version, kind, 0), d: placeholder(code) };
  const size = serialize(dummy, kind).length;

  dummy.v = versify(Protocol.ACDC, version, kind, size);
  const sized = serialize(dummy, kind);
  if (sized.length !== size) {
    throw err.Internal(`size changed from ${size} to ${sized.length} when setting the version header`);
  }

  const said = diger(sized, code);
  if (said.length !== placeholder(code).length) {
    throw err.Internal(`digest length ${said.length} does not match placeholder for code ${code}`);
  }

  const final: JsonObject = { ...dummy, d: said };
  const raw = serialize(final, kind);
  if (raw.length !== size) {
    throw err.Internal(`size changed from ${size} to ${raw.length} when inserting the identifier`);
  }

  return { raw, said: s(said).asSAID(), sad: final };
}

/**
 * Verify a raw container serialization against its own identifier
 *
 * Only the identifier span is replaced; every other byte is re-digested as
 * received, so field order is never re-derived.
 */
export function verifyIdentifier(raw: Uint8Array): Result<Verified> {
  try {
    return ok(checkIdentifier(raw));
  } catch (error) {
    if (isAcdcError(error)) {
      return fail(error);
    }
    throw error;
  }
}

function checkIdentifier(raw: Uint8Array): Verified {
  const header = sniff(raw);
  if (header.size !== raw.length) {
    throw err.SizeMismatch(header.size, raw.length);
  }

  const sad = deserialize(raw, header.kind);
  if (sad.v !== versify(header.protocol, header.version, header.kind, header.size)) {
    throw err.MalformedHeader(`'v' field does not match the leading version string`);
  }

  const said = sad.d;
  if (typeof said !== 'string') {
    throw err.InvalidField('d', 'identifier must be a string');
  }

  const code = digestCodeOf(said);
  if (!isDigestCode(code)) {
    throw err.UnknownAlgorithm(said);
  }
  const digest = new Diger({ qb64: said });

  const span = indexOfBytes(raw, textToBytes(said));
  if (span < 0) {
    throw err.Internal(`identifier ${said} not found in raw bytes`);
  }

  const dummy = raw.slice();
  dummy.set(textToBytes(placeholder(code)), span);
  if (!digest.verify(dummy)) {
    throw err.DigestMismatch(said);
  }

  return { said: s(said).asSAID(), header, sad };
}

/**
 * Generate the SAID of a field map that has no version header
 *
 * Used for nested blocks (attributes, edges, rules) and schemas: the SAID
 * field is filled with a placeholder, the block serialized and digested,
 * then the SAID written back.
 *
 * @returns The block with its SAID field populated, and the SAID
 */
export function saidify<T extends JsonObject>(
  obj: T,
  options: SaidifyOptions = {}
): { said: SAID; sad: T } {
  const label = options.label ?? 'd';
  const code = options.code ?? DigDex.Blake3_256;
  const kind = options.kind ?? Kind.JSON;

  if (!(label in obj)) {
    throw err.InvalidField(label, `missing id field labeled=${label} in sad`);
  }

  const dummy = { ...obj, [label]: placeholder(code) };
  const said = diger(serialize(dummy, kind), code);

  return { said: s(said).asSAID(), sad: { ...obj, [label]: said } };
}

/**
 * Check that a field map carries its own SAID under label
 */
export function verifySaidified(obj: JsonObject, options: SaidifyOptions = {}): boolean {
  const label = options.label ?? 'd';
  const current = obj[label];
  if (typeof current !== 'string') {
    return false;
  }

  const code = digestCodeOf(current);
  if (!isDigestCode(code)) {
    return false;
  }

  const { said } = saidify(obj, { ...options, code });
  return said === current;
}
