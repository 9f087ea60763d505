/**
 * ACDC version string generation and parsing
 *
 * Version strings have the fixed layout:
 * <protocol><major><minor><kind><size>_
 *
 * Example: ACDC10JSON0000aa_ (ACDC 1.0, JSON, 0xaa bytes)
 */

import { err } from './errors';

/**
 * Protocol identifiers
 */
export enum Protocol {
  ACDC = 'ACDC',
}

/**
 * Serialization kinds
 */
export enum Kind {
  JSON = 'JSON',
  CBOR = 'CBOR',
  MGPK = 'MGPK',
}

/**
 * Protocol version
 */
export interface Version {
  major: number;
  minor: number;
}

/**
 * Default ACDC version 1.0
 */
export const VERSION_1_0: Version = { major: 1, minor: 0 };

/**
 * Decoded version header
 */
export interface VersionHeader {
  protocol: Protocol;
  version: Version;
  kind: Kind;
  size: number;
}

/** Width of the hex size field */
export const SIZE_WIDTH = 6;
export const MAX_SIZE = 16 ** SIZE_WIDTH - 1;

/** Total length of a version string */
export const VERSION_LENGTH = 17;

const TERMINATOR = '_';

const KINDS: ReadonlySet<string> = new Set(Object.values(Kind));

export function isKind(value: string): value is Kind {
  return KINDS.has(value);
}

/**
 * Generate an ACDC version string
 *
 * @param size - Size of the serialized container in bytes
 * @returns Version string in format: <protocol><major><minor><kind><size>_
 *
 * @example
 * versify() // 'ACDC10JSON000000_'
 * versify(Protocol.ACDC, VERSION_1_0, Kind.JSON, 170) // 'ACDC10JSON0000aa_'
 */
export function versify(
  protocol: Protocol = Protocol.ACDC,
  version: Version = VERSION_1_0,
  kind: Kind = Kind.JSON,
  size: number = 0
): string {
  if (!Number.isInteger(size) || size < 0 || size > MAX_SIZE) {
    throw err.HeaderSizeOverflow(size);
  }
  if (!isVersionDigit(version.major) || !isVersionDigit(version.minor)) {
    throw err.MalformedHeader(`version ${version.major}.${version.minor} must be single hex digits`);
  }

  const major = version.major.toString(16);
  const minor = version.minor.toString(16);
  const sizeHex = size.toString(16).padStart(SIZE_WIDTH, '0');

  return `${protocol}${major}${minor}${kind}${sizeHex}${TERMINATOR}`;
}

/**
 * Parse a version string
 *
 * Does not compare the size against any buffer; that belongs to
 * identifier verification.
 */
export function deversify(vs: string): VersionHeader {
  if (vs.length !== VERSION_LENGTH) {
    throw err.MalformedHeader(`expected ${VERSION_LENGTH} characters, got ${vs.length}`);
  }

  const protocol = vs.slice(0, 4);
  const major = vs.slice(4, 5);
  const minor = vs.slice(5, 6);
  const kind = vs.slice(6, 10);
  const sizeHex = vs.slice(10, 16);

  if (protocol !== Protocol.ACDC) {
    throw err.MalformedHeader(`unexpected protocol '${protocol}'`);
  }
  if (!/^[0-9a-f]$/.test(major) || !/^[0-9a-f]$/.test(minor)) {
    throw err.MalformedHeader(`invalid version '${major}${minor}'`);
  }
  if (!isKind(kind)) {
    throw err.UnsupportedKind(kind);
  }
  if (!/^[0-9a-f]{6}$/.test(sizeHex)) {
    throw err.MalformedHeader(`invalid size '${sizeHex}'`);
  }
  if (vs[16] !== TERMINATOR) {
    throw err.MalformedHeader(`missing terminator`);
  }

  return {
    protocol: Protocol.ACDC,
    version: { major: parseInt(major, 16), minor: parseInt(minor, 16) },
    kind,
    size: parseInt(sizeHex, 16),
  };
}

const SNIFF_WINDOW = 32;
const SNIFF_PATTERN = /([A-Z]{4})([0-9a-f])([0-9a-f])([A-Z0-9]{4})([0-9a-fA-F]{6})_/;

/**
 * Find and parse the version header in the leading bytes of a raw
 * serialization of any kind. The header is always the first field.
 */
export function sniff(raw: Uint8Array): VersionHeader {
  let head = '';
  for (const byte of raw.subarray(0, SNIFF_WINDOW)) {
    head += String.fromCharCode(byte);
  }

  const match = SNIFF_PATTERN.exec(head);
  if (!match) {
    throw err.MalformedHeader('no version string in leading bytes');
  }
  return deversify(match[0] ?? '');
}

function isVersionDigit(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n < 16;
}
