/**
 * Cycle detection in chain validation
 *
 * Honest digests cannot reference each other in a loop, so digest checks
 * are replaced by a structural decode here to build one.
 */

import { describe, it, expect, vi } from 'vitest';

vi.mock('./container', async (importOriginal) => {
    const actual = await importOriginal<typeof import('./container')>();
    const { ok } = await import('../types');
    return {
        ...actual,
        verifyRaw: (input: Uint8Array | string) => ok(actual.decode(input).said),
    };
});

import { decode } from './container';
import { validateChain } from './chain';
import { MemoryResolver } from '../model/io/resolver';

function node(said: string, edges: string): string {
    return `{"v":"ACDC10JSON000000_","d":"${said}","i":"Issuer","ri":"","s":"Eschema","e":{${edges}}}`;
}

describe('validateChain() cycles', () => {
    it('should report A -> B -> A as CycleDetected', async () => {
        const resolver = new MemoryResolver();
        resolver.add(node('Ebeta', '"back":{"n":"Ealpha"}'));
        const root = decode(node('Ealpha', '"next":{"n":"Ebeta"}'));

        const result = await validateChain(root, resolver);

        expect(result).toEqual({
            valid: false,
            said: 'Ealpha',
            error: { code: 'CycleDetected', message: 'Cycle detected at Ealpha', said: 'Ealpha' },
        });
    });

    it('should report a self reference', async () => {
        const root = decode(node('Eself', '"me":{"n":"Eself"}'));
        const result = await validateChain(root, new MemoryResolver());
        expect(result.error?.code).toBe('CycleDetected');
    });

    it('should fail the chain even when the cycle sits under OR or NOT', async () => {
        const resolver = new MemoryResolver();
        resolver.add(node('Ebeta', '"back":{"n":"Ealpha","o":"NOT"}'));
        resolver.add(node('Egamma', ''));
        const root = decode(node('Ealpha', '"next":{"n":"Ebeta","o":"OR"},"other":{"n":"Egamma","o":"OR"}'));

        const result = await validateChain(root, resolver);
        expect(result.error).toMatchObject({ code: 'CycleDetected', said: 'Ealpha' });
    });

    it('should still validate acyclic graphs', async () => {
        const resolver = new MemoryResolver();
        resolver.add(node('Ebeta', ''));
        const root = decode(node('Ealpha', '"next":{"n":"Ebeta"}'));

        expect((await validateChain(root, resolver)).valid).toBe(true);
    });
});
