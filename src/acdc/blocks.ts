/**
 * Block wire forms and block SAIDs
 */

import { digestCodeOf, digestSizage, isDigestCode, type DigestCode } from '../cesr/codex';
import { diger } from '../cesr/diger';
import { serialize } from '../serder';
import { saidify, type SaidifyOptions } from '../saidify';
import type { Kind } from '../versify';
import { loadConfig } from '../config';
import { err } from '../errors';
import { isJsonObject, s, type JsonObject, type JsonValue, type SAID } from '../types';
import { OPERATORS, type EdgeRef, type Edges, type Operator } from './types';

export interface BlockOptions {
    kind?: Kind;
    code?: DigestCode;
}

/**
 * Whether a string is a well-formed SAID for a known digest code
 */
export function isSaid(value: unknown): value is SAID {
    if (typeof value !== 'string') return false;
    const code = digestCodeOf(value);
    if (!isDigestCode(code)) return false;
    return value.length === digestSizage(code).fs && /^[A-Za-z0-9_-]+$/.test(value);
}

/**
 * Compute the SAID a block is replaced by when compacted
 *
 * A block with a 'd' label is a miniature container: its own SAID goes in
 * 'd' and is computed over a placeholder. A block without one is digested
 * as it stands.
 */
export function compactBlock(block: JsonObject, options: BlockOptions = {}): SAID {
    const kind = options.kind ?? loadConfig().kind;
    const code = options.code ?? loadConfig().code;

    if ('d' in block) {
        return saidify(block, { label: 'd', kind, code }).said;
    }
    return s(diger(serialize(block, kind), code)).asSAID();
}

/**
 * Whether full block data is the block a SAID stands for
 *
 * 'd' is replaced by a placeholder before digesting, so a block that
 * carries one must also hold the SAID itself there.
 */
export function matchesBlock(block: JsonObject, said: SAID, options: BlockOptions = {}): boolean {
    if ('d' in block && block.d !== said) {
        return false;
    }
    return compactBlock(block, options) === said;
}

/**
 * Fill a block's own SAID field (default label 'd')
 */
export function saidifyBlock<T extends JsonObject>(block: T, options: SaidifyOptions = {}): T {
    const kind = options.kind ?? loadConfig().kind;
    const code = options.code ?? loadConfig().code;
    return saidify(block, { ...options, kind, code }).sad;
}

export function edgesToWire(edges: Edges): JsonObject {
    const wire: JsonObject = {};
    if (edges.d !== undefined) {
        wire.d = edges.d;
    }
    for (const [label, edge] of Object.entries(edges.edges)) {
        const entry: JsonObject = { n: edge.n };
        if (edge.s !== undefined) entry.s = edge.s;
        if (edge.o !== undefined) entry.o = edge.o;
        wire[label] = entry;
    }
    return wire;
}

export function edgesFromWire(wire: JsonObject): Edges {
    const edges: Record<string, EdgeRef> = {};
    let d: SAID | undefined;

    for (const [position, [label, value]] of Object.entries(wire).entries()) {
        if (label === 'd') {
            if (!isSaid(value)) {
                throw err.InvalidField('e.d', 'edge block SAID is malformed');
            }
            if (position !== 0) {
                throw err.InvalidField('e.d', 'edge block SAID must come first');
            }
            d = value;
            continue;
        }
        assertEdgeOrder(label, value);
        edges[label] = parseEdge(label, value);
    }

    return d === undefined ? { edges } : { d, edges };
}

const EDGE_FIELDS: ReadonlyArray<string> = ['n', 's', 'o'];

/**
 * Edge fields must appear in the order they are emitted in: n, s, o
 */
function assertEdgeOrder(label: string, value: JsonValue | undefined): void {
    if (!isJsonObject(value)) {
        return;
    }
    let last = -1;
    for (const key of Object.keys(value)) {
        const position = EDGE_FIELDS.indexOf(key);
        if (position < 0) {
            continue;
        }
        if (position < last) {
            throw err.InvalidField(`e.${label}.${key}`, 'edge fields must be in n, s, o order');
        }
        last = position;
    }
}

/**
 * Validate one edge from untyped input
 */
export function parseEdge(label: string, value: JsonValue | undefined): EdgeRef {
    if (!isJsonObject(value)) {
        throw err.InvalidField(`e.${label}`, 'edge must be a mapping');
    }
    const { n, s: schema, o } = value;
    if (typeof n !== 'string' || n.length === 0) {
        throw err.InvalidField(`e.${label}.n`, 'edge target must be a non-empty identifier');
    }

    const edge: EdgeRef = { n: s(n).asSAID() };
    if (schema !== undefined) {
        if (typeof schema !== 'string') {
            throw err.InvalidField(`e.${label}.s`, 'edge schema must be a string');
        }
        edge.s = s(schema).asSAID();
    }
    if (o !== undefined) {
        if (!isOperator(o)) {
            throw err.InvalidField(`e.${label}.o`, `operator must be one of ${OPERATORS.join(', ')}`);
        }
        edge.o = o;
    }
    for (const key of Object.keys(value)) {
        if (key !== 'n' && key !== 's' && key !== 'o') {
            throw err.InvalidField(`e.${label}.${key}`, 'unknown edge field');
        }
    }
    return edge;
}

export function isOperator(value: unknown): value is Operator {
    return OPERATORS.some(op => op === value);
}
