/**
 * Tests for the SAID engine
 */

import { describe, it, expect } from 'vitest';
import { computeIdentifier, verifyIdentifier, saidify, verifySaidified, placeholder } from './saidify';
import { bytesToText, textToBytes } from './cesr/utils';
import { DigDex } from './cesr/codex';
import { Kind } from './versify';
import type { JsonObject } from './types';

const SCHEMA = 'EFNWOR0fQbv_J6EL0pJlvCxEpbu4bg1AurHgr_0A7LKc';
const EXPECTED =
    '{"v":"ACDC10JSON0000aa_","d":"EHaPRLWlw9RkQxgn9BGWzgJwsQy0HtOksqAstXbxo_NB","i":"Issuer","ri":"",' +
    '"s":"EFNWOR0fQbv_J6EL0pJlvCxEpbu4bg1AurHgr_0A7LKc","a":{"hello":"world"}}';

function fields(): JsonObject {
    return { v: '', d: '', i: 'Issuer', ri: '', s: SCHEMA, a: { hello: 'world' } };
}

describe('placeholder()', () => {
    it('should match the encoded length of the digest code', () => {
        expect(placeholder(DigDex.Blake3_256)).toBe('#'.repeat(44));
        expect(placeholder(DigDex.SHA2_512)).toHaveLength(88);
    });
});

describe('computeIdentifier()', () => {
    it('should produce the known JSON serialization and identifier', () => {
        const { raw, said, sad } = computeIdentifier(fields());

        expect(bytesToText(raw)).toBe(EXPECTED);
        expect(raw).toHaveLength(170);
        expect(said).toBe('EHaPRLWlw9RkQxgn9BGWzgJwsQy0HtOksqAstXbxo_NB');
        expect(sad.v).toBe('ACDC10JSON0000aa_');
    });

    it('should ignore whatever v and d held before', () => {
        const stale = { ...fields(), v: 'ACDC10JSON0000ff_', d: 'stale' };
        expect(computeIdentifier(stale).said).toBe('EHaPRLWlw9RkQxgn9BGWzgJwsQy0HtOksqAstXbxo_NB');
    });

    it('should verify in binary kinds', () => {
        for (const kind of [Kind.CBOR, Kind.MGPK]) {
            const { raw, said } = computeIdentifier(fields(), { kind });
            const result = verifyIdentifier(raw);

            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.data.said).toBe(said);
                expect(result.data.header.kind).toBe(kind);
                expect(result.data.header.size).toBe(raw.length);
            }
        }
    });

    it('should size the placeholder for long digest codes', () => {
        const { raw, said } = computeIdentifier(fields(), { code: DigDex.Blake3_512 });

        expect(said).toHaveLength(88);
        expect(said.startsWith('0D')).toBe(true);
        expect(verifyIdentifier(raw).ok).toBe(true);
    });

    it('should require v and d labels', () => {
        expect(() => computeIdentifier({ i: 'Issuer' })).toThrow(`Invalid field 'v': field map needs v and d labels`);
    });
});

describe('verifyIdentifier()', () => {
    it('should accept the known serialization', () => {
        const result = verifyIdentifier(textToBytes(EXPECTED));
        expect(result.ok && result.data.said).toBe('EHaPRLWlw9RkQxgn9BGWzgJwsQy0HtOksqAstXbxo_NB');
    });

    it('should detect a changed field of the same length', () => {
        const result = verifyIdentifier(textToBytes(EXPECTED.replace('"Issuer"', '"Issues"')));
        expect(!result.ok && result.error.code).toBe('DigestMismatch');
    });

    it('should detect a size that does not match the buffer', () => {
        const result = verifyIdentifier(textToBytes(EXPECTED + ' '));
        expect(!result.ok && result.error.code).toBe('SizeMismatch');
        expect(!result.ok && result.error.message).toBe('Declared size 170 does not match actual size 171');
    });

    it('should report an unknown digest code', () => {
        const result = verifyIdentifier(textToBytes(EXPECTED.replace('"d":"E', '"d":"X')));
        expect(!result.ok && result.error.code).toBe('UnknownAlgorithm');
    });

    it('should report bytes without a version header', () => {
        const result = verifyIdentifier(textToBytes('{"hello":"world"}'));
        expect(!result.ok && result.error.code).toBe('MalformedHeader');
    });
});

describe('saidify()', () => {
    it('should embed the SAID of a block under d', () => {
        const { said, sad } = saidify({ d: '', hello: 'world' });

        expect(said).toBe('EE2QWsyNeMTE2ZWaB7Q5ZWDPcrB-p8BSWQ2zqb5zyRgS');
        expect(sad).toEqual({ d: said, hello: 'world' });
        expect(verifySaidified(sad)).toBe(true);
        expect(verifySaidified({ ...sad, hello: 'there' })).toBe(false);
    });

    it('should fail when the label is missing', () => {
        expect(() => saidify({ hello: 'world' })).toThrow(`Invalid field 'd': missing id field labeled=d in sad`);
    });
});
