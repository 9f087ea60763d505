/**
 * Tests for version string generation, parsing and sniffing
 */

import { describe, it, expect } from 'vitest';
import { versify, deversify, sniff, Kind, Protocol, VERSION_1_0, MAX_SIZE } from './versify';
import { textToBytes } from './cesr/utils';
import { AcdcError } from './errors';

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        if (error instanceof AcdcError) return error.code;
        throw error;
    }
    return undefined;
}

describe('versify()', () => {
    it('should default to an empty JSON ACDC 1.0 header', () => {
        expect(versify()).toBe('ACDC10JSON000000_');
    });

    it('should write the size as six lowercase hex digits', () => {
        expect(versify(Protocol.ACDC, VERSION_1_0, Kind.JSON, 170)).toBe('ACDC10JSON0000aa_');
        expect(versify(Protocol.ACDC, VERSION_1_0, Kind.CBOR, 0x1234)).toBe('ACDC10CBOR001234_');
        expect(versify(Protocol.ACDC, VERSION_1_0, Kind.MGPK, MAX_SIZE)).toBe('ACDC10MGPKffffff_');
    });

    it('should reject sizes that do not fit the size field', () => {
        expect(codeOf(() => versify(Protocol.ACDC, VERSION_1_0, Kind.JSON, MAX_SIZE + 1))).toBe('HeaderSizeOverflow');
        expect(codeOf(() => versify(Protocol.ACDC, VERSION_1_0, Kind.JSON, -1))).toBe('HeaderSizeOverflow');
    });

    it('should reject versions wider than one hex digit', () => {
        expect(codeOf(() => versify(Protocol.ACDC, { major: 16, minor: 0 }, Kind.JSON, 0))).toBe('MalformedHeader');
    });
});

describe('deversify()', () => {
    it('should parse every field', () => {
        expect(deversify('ACDC10JSON0000aa_')).toEqual({
            protocol: Protocol.ACDC,
            version: { major: 1, minor: 0 },
            kind: Kind.JSON,
            size: 170,
        });
    });

    it('should round trip with versify', () => {
        for (const kind of [Kind.JSON, Kind.CBOR, Kind.MGPK]) {
            const vs = versify(Protocol.ACDC, VERSION_1_0, kind, 513);
            expect(deversify(vs).kind).toBe(kind);
            expect(deversify(vs).size).toBe(513);
        }
    });

    it('should report an unknown kind as UnsupportedKind', () => {
        expect(codeOf(() => deversify('ACDC10YAML0000aa_'))).toBe('UnsupportedKind');
    });

    it('should report other layout problems as MalformedHeader', () => {
        expect(codeOf(() => deversify('ACDC10JSON0000aa'))).toBe('MalformedHeader');
        expect(codeOf(() => deversify('KERI10JSON0000aa_'))).toBe('MalformedHeader');
        expect(codeOf(() => deversify('ACDC10JSON0000zz_'))).toBe('MalformedHeader');
        expect(codeOf(() => deversify('ACDC10JSON0000aa.'))).toBe('MalformedHeader');
    });
});

describe('sniff()', () => {
    it('should find the header at the start of a JSON serialization', () => {
        const raw = textToBytes('{"v":"ACDC10JSON0000aa_","d":""}');
        expect(sniff(raw).size).toBe(170);
    });

    it('should find the header behind binary map prefixes', () => {
        const prefix = new Uint8Array([0xa6, 0x61, 0x76, 0x71]);
        const header = textToBytes('ACDC10CBOR00002a_');
        const raw = new Uint8Array(prefix.length + header.length);
        raw.set(prefix);
        raw.set(header, prefix.length);

        expect(sniff(raw)).toMatchObject({ kind: Kind.CBOR, size: 42 });
    });

    it('should fail when no header is present', () => {
        expect(codeOf(() => sniff(textToBytes('{"hello":"world"}')))).toBe('MalformedHeader');
    });
});
