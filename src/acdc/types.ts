/**
 * ACDC container types
 *
 * @see https://trustoverip.github.io/tswg-acdc-specification/
 */

import type { DigestCode } from '../cesr/codex';
import type { Kind, VersionHeader } from '../versify';
import type { JsonObject, SAID } from '../types';

/**
 * A block is either carried inline or replaced by its own SAID
 */
export type Block<T> =
    | { readonly kind: 'inline'; readonly data: T }
    | { readonly kind: 'compact'; readonly said: SAID };

export const inline = <T>(data: T): Block<T> => ({ kind: 'inline', data });
export const compacted = <T>(said: SAID): Block<T> => ({ kind: 'compact', said });

/** Labels of the blocks that can be compacted */
export type BlockLabel = 'a' | 'e' | 'r';

export type Operator = 'AND' | 'OR' | 'NOT';
export const OPERATORS: ReadonlyArray<Operator> = ['AND', 'OR', 'NOT'];

/**
 * Edge to another container
 *
 * Wire form: { n: target SAID, s?: schema SAID, o?: operator }
 */
export interface EdgeRef {
    /** SAID of the referenced container */
    n: SAID;
    /** Schema the referenced container must be issued under */
    s?: SAID;
    /** How this edge combines with its siblings (default AND) */
    o?: Operator;
}

/**
 * Edge block: label → edge, plus an optional own SAID under 'd'
 */
export interface Edges {
    d?: SAID;
    edges: Record<string, EdgeRef>;
}

export type Attributes = JsonObject;
export type Rules = JsonObject;

/**
 * Authentic Chained Data Container
 *
 * Immutable once its identifier is finalized: changing any field
 * invalidates 'said' until the container is encoded again.
 */
export interface Container {
    /** Version header (v) */
    readonly version: VersionHeader;
    /** Self-addressing identifier (d) */
    readonly said: SAID;
    /** Issuer identifier (i) */
    readonly issuer: string;
    /** Registry identifier (ri), empty string when there is none */
    readonly registry: string;
    /** Schema SAID (s) */
    readonly schema: string;
    /** Attributes (a) */
    readonly attributes?: Block<Attributes>;
    /** Edges (e) */
    readonly edges?: Block<Edges>;
    /** Rules (r) */
    readonly rules?: Block<Rules>;
}

/**
 * Parameters for building a container
 */
export interface BuildParams {
    issuer: string;
    /** Registry identifier (default: empty string) */
    registry?: string;
    schema: string;
    /** Inline attributes, or the SAID of a compact attribute block */
    attributes: Attributes | string;
    edges?: Record<string, EdgeRef> | string;
    rules?: Rules | string;
    /** Recipient identifier; makes the attribute block targeted (a.i) */
    recipient?: string;
    /** Blind the attribute block with a random salt (a.u) */
    salted?: boolean;
    /** Fixed salt to use instead of a random one */
    salt?: string;
    kind?: Kind;
    code?: DigestCode;
}
