/**
 * Tests for canonical serialization across kinds
 */

import { describe, it, expect } from 'vitest';
import { serialize, deserialize, assertLabelOrder } from './serder';
import { bytesToText, textToBytes } from './cesr/utils';
import { Kind } from './versify';
import { AcdcError } from './errors';
import type { JsonObject } from './types';

function failure(fn: () => unknown): AcdcError {
    try {
        fn();
    } catch (error) {
        if (error instanceof AcdcError) return error;
        throw error;
    }
    throw new Error('expected an AcdcError');
}

const sample: JsonObject = {
    zeta: 'last letter first',
    alpha: 1,
    nested: { b: [true, false, null], a: 2.5 },
    list: [1, 'two', { three: 3 }],
};

describe('serialize()', () => {
    it('should emit compact JSON in insertion order', () => {
        const raw = serialize({ b: 1, a: 'x', c: [true, null] }, Kind.JSON);
        expect(bytesToText(raw)).toBe('{"b":1,"a":"x","c":[true,null]}');
    });

    it('should escape strings the same way as JSON.stringify', () => {
        const raw = serialize({ q: 'say "hi"\n', u: 'café' }, Kind.JSON);
        expect(bytesToText(raw)).toBe('{"q":"say \\"hi\\"\\n","u":"café"}');
    });

    it('should reject non-finite numbers in every kind', () => {
        for (const kind of [Kind.JSON, Kind.CBOR, Kind.MGPK]) {
            const error = failure(() => serialize({ n: Number.NaN }, kind));
            expect(error.code).toBe('InvalidField');
        }
    });

    it('should reject integer-like keys', () => {
        const error = failure(() => serialize({ b: 1, nested: { x: true, '7': false } }, Kind.JSON));
        expect(error.message).toBe(`Invalid field '$.nested.7': integer-like keys do not keep insertion order`);
    });

    it('should be deterministic within a kind', () => {
        for (const kind of [Kind.JSON, Kind.CBOR, Kind.MGPK]) {
            expect(serialize(sample, kind)).toEqual(serialize({ ...sample }, kind));
        }
    });

    it('should produce different bytes per kind', () => {
        const json = serialize(sample, Kind.JSON);
        const cbor = serialize(sample, Kind.CBOR);
        const mgpk = serialize(sample, Kind.MGPK);
        expect(cbor).not.toEqual(json);
        expect(mgpk).not.toEqual(cbor);
    });
});

describe('deserialize()', () => {
    it('should restore values and key order for every kind', () => {
        for (const kind of [Kind.JSON, Kind.CBOR, Kind.MGPK]) {
            const decoded = deserialize(serialize(sample, kind), kind);
            expect(decoded).toEqual(sample);
            expect(Object.keys(decoded)).toEqual(['zeta', 'alpha', 'nested', 'list']);
        }
    });

    it('should leave the input buffer untouched', () => {
        for (const kind of [Kind.CBOR, Kind.MGPK]) {
            const raw = serialize(sample, kind);
            deserialize(raw, kind);
            expect(raw).toEqual(serialize(sample, kind));
        }
    });

    it('should reject integer-like keys in received bytes', () => {
        const error = failure(() => deserialize(textToBytes('{"b":1,"1":2}'), Kind.JSON));
        expect(error.message).toBe(`Invalid field '$.1': integer-like keys do not keep insertion order`);
    });

    it('should report unparsable input as InvalidField', () => {
        expect(failure(() => deserialize(textToBytes('{"a":'), Kind.JSON)).code).toBe('InvalidField');
    });

    it('should require a mapping at the top level', () => {
        const error = failure(() => deserialize(textToBytes('[1,2]'), Kind.JSON));
        expect(error.message).toBe(`Invalid field '$': top level must be a mapping`);
    });
});

describe('assertLabelOrder()', () => {
    const base = { v: 'ACDC10JSON000000_', d: '', i: 'Issuer', ri: '', s: 'schema' };

    it('should accept the canonical order with optional blocks', () => {
        expect(() => assertLabelOrder({ ...base, a: {}, e: {}, r: {} })).not.toThrow();
    });

    it('should reject labels out of order', () => {
        const error = failure(() => assertLabelOrder({ v: '', i: '', d: '', ri: '', s: '' }));
        expect(error.message).toBe(`Invalid field 'd': top-level labels out of order`);
    });

    it('should reject unknown labels', () => {
        const error = failure(() => assertLabelOrder({ ...base, x: 1 }));
        expect(error.message).toBe(`Invalid field 'x': unknown top-level label`);
    });

    it('should reject missing required labels', () => {
        const error = failure(() => assertLabelOrder({ v: '', d: '', i: '', s: '' }));
        expect(error.message).toBe(`Invalid field 'ri': missing required field`);
    });
});
