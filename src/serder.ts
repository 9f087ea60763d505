/**
 * Serder - canonical serialization of ACDC field maps
 *
 * One closed dispatch over the supported kinds. Every kind keeps insertion
 * order for mappings and emits no whitespace, so the same logical content
 * always yields the same bytes within a kind. Bytes are NOT comparable
 * across kinds.
 */

import { Encoder as CborEncoder } from 'cbor-x';
import { Packr } from 'msgpackr';
import { Kind } from './versify';
import { err } from './errors';
import { bytesToText, textToBytes } from './cesr/utils';
import { isJsonObject, type JsonObject, type JsonValue } from './types';

/**
 * Top-level labels in the only order they may be emitted
 */
export const LABELS = ['v', 'd', 'i', 'ri', 's', 'a', 'e', 'r'] as const;
export type Label = typeof LABELS[number];

/** Labels that must be present in every container */
export const REQUIRED_LABELS: ReadonlyArray<Label> = ['v', 'd', 'i', 'ri', 's'];

const cbor = new CborEncoder({
  useRecords: false,
  mapsAsObjects: true,
  structuredClone: false,
  pack: false,
  variableMapSize: true,
});

const mgpk = new Packr({
  useRecords: false,
  mapsAsObjects: true,
  structuredClone: false,
  variableMapSize: true,
});

/**
 * Serialize a field map in the given kind
 */
export function serialize(sad: JsonObject, kind: Kind): Uint8Array {
  switch (kind) {
    case Kind.JSON:
      assertJson(sad, '$');
      return textToBytes(serializeJson(sad, '$'));

    case Kind.CBOR:
      assertJson(sad, '$');
      return new Uint8Array(cbor.encode(sad));

    case Kind.MGPK:
      assertJson(sad, '$');
      return new Uint8Array(mgpk.pack(sad));
  }
}

/**
 * Deserialize bytes of the given kind into a field map
 */
export function deserialize(raw: Uint8Array, kind: Kind): JsonObject {
  let value: unknown;
  try {
    switch (kind) {
      case Kind.JSON:
        value = JSON.parse(bytesToText(raw));
        break;
      case Kind.CBOR:
        value = cbor.decode(raw.slice());
        break;
      case Kind.MGPK:
        value = mgpk.unpack(raw.slice());
        break;
    }
  } catch (error) {
    throw err.InvalidField('$', `unparsable ${kind}: ${error instanceof Error ? error.message : String(error)}`);
  }

  assertJson(value, '$');
  if (!isJsonObject(value)) {
    throw err.InvalidField('$', 'top level must be a mapping');
  }
  return value;
}

/**
 * Check that top-level labels are known and appear in canonical order
 */
export function assertLabelOrder(sad: JsonObject): void {
  let last = -1;
  for (const key of Object.keys(sad)) {
    const position = LABELS.findIndex(label => label === key);
    if (position < 0) {
      throw err.InvalidField(key, 'unknown top-level label');
    }
    if (position < last) {
      throw err.InvalidField(key, 'top-level labels out of order');
    }
    last = position;
  }
  for (const label of REQUIRED_LABELS) {
    if (!(label in sad)) {
      throw err.InvalidField(label, 'missing required field');
    }
  }
}

/**
 * Compact JSON in insertion order (no sorting, no whitespace)
 */
function serializeJson(value: unknown, path: string): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw err.InvalidField(path, `non-finite number ${value}`);
    }
    return JSON.stringify(value);
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    const items = value.map((item, i) => serializeJson(item, `${path}[${i}]`));
    return '[' + items.join(',') + ']';
  }

  if (isJsonObject(value)) {
    const pairs = Object.keys(value).map(key => {
      return JSON.stringify(key) + ':' + serializeJson(value[key], `${path}.${key}`);
    });
    return '{' + pairs.join(',') + '}';
  }

  throw err.InvalidField(path, `cannot serialize value of type ${typeof value}`);
}

/**
 * Walk a value and reject anything that is not plain JSON data
 */
export function assertJson(value: unknown, path: string): asserts value is JsonValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw err.InvalidField(path, `non-finite number ${value}`);
    }
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item, i) => assertJson(item, `${path}[${i}]`));
    return;
  }
  if (isJsonObject(value) && Object.getPrototypeOf(value) === Object.prototype) {
    for (const key of Object.keys(value)) {
      if (isIndexKey(key)) {
        throw err.InvalidField(`${path}.${key}`, 'integer-like keys do not keep insertion order');
      }
      assertJson(value[key], `${path}.${key}`);
    }
    return;
  }
  throw err.InvalidField(path, `unsupported value of type ${typeof value}`);
}

/**
 * Keys that object property order always puts first, ahead of insertion order
 */
function isIndexKey(key: string): boolean {
  return /^(?:0|[1-9]\d*)$/.test(key) && Number(key) < 2 ** 32 - 1;
}
