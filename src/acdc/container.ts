/**
 * ACDC (Authentic Chained Data Container)
 *
 * Pure functions that build, encode, decode and verify containers. A
 * container is a plain immutable value; every operation that changes its
 * content returns a new container with a recomputed identifier.
 */

import { digestCodeOf, isDigestCode, type DigestCode } from '../cesr/codex';
import { salt as newSalt } from '../cesr/salter';
import { bytesToText, textToBytes } from '../cesr/utils';
import { loadConfig } from '../config';
import { err, isAcdcError } from '../errors';
import { computeIdentifier, saidify, verifyIdentifier } from '../saidify';
import { assertJson, assertLabelOrder, deserialize, serialize } from '../serder';
import { fail, isJsonObject, ok, s, type JsonObject, type JsonValue, type Result, type SAID } from '../types';
import { deversify, sniff, versify, Kind, Protocol, VERSION_1_0, type VersionHeader } from '../versify';
import { edgesFromWire, edgesToWire, isSaid, matchesBlock, parseEdge } from './blocks';
import {
    compacted,
    inline,
    type Attributes,
    type Block,
    type BuildParams,
    type Container,
    type EdgeRef,
    type Edges,
    type Rules,
} from './types';

/**
 * Create a container and compute its identifier
 *
 * @throws AcdcError InvalidField when the schema or issuer is empty, or the
 *   attributes are neither a mapping nor a well-formed SAID
 */
export function build(params: BuildParams): Container {
    const { issuer, schema, registry = '' } = params;
    const config = params.kind !== undefined && params.code !== undefined
        ? { kind: params.kind, code: params.code }
        : loadConfig();
    const kind = params.kind ?? config.kind;
    const code = params.code ?? config.code;

    if (typeof schema !== 'string' || schema.length === 0) {
        throw err.InvalidField('s', 'schema identifier is required');
    }
    if (typeof issuer !== 'string' || issuer.length === 0) {
        throw err.InvalidField('i', 'issuer identifier is required');
    }
    if (typeof registry !== 'string') {
        throw err.InvalidField('ri', 'registry identifier must be a string');
    }

    const draft: Container = {
        version: { protocol: Protocol.ACDC, version: VERSION_1_0, kind, size: 0 },
        said: s('').asSAID(),
        issuer,
        registry,
        schema,
        attributes: buildAttributes(params, kind, code),
        edges: params.edges === undefined ? undefined : buildEdges(params.edges),
        rules: params.rules === undefined ? undefined : buildRules(params.rules),
    };

    return finalize(draft, { kind, code });
}

/** Alias of build */
export const newContainer = build;

function buildAttributes(params: BuildParams, kind: Kind, code: DigestCode): Block<Attributes> {
    const { attributes, recipient, salted } = params;

    if (typeof attributes === 'string') {
        if (!isSaid(attributes)) {
            throw err.InvalidField('a', 'compact attributes must be a well-formed SAID');
        }
        if (recipient !== undefined || salted) {
            throw err.InvalidField('a', 'recipient and salt need inline attributes');
        }
        return compacted(attributes);
    }

    if (!isJsonObject(attributes)) {
        throw err.InvalidField('a', 'attributes must be a mapping or a SAID');
    }
    assertJson(attributes, 'a');

    if (recipient === undefined && !salted) {
        return inline(attributes);
    }

    // Targeted and private blocks carry their own SAID: { d, u?, i?, ...data }
    for (const reserved of ['d', 'u', 'i']) {
        if (reserved in attributes) {
            throw err.InvalidField(`a.${reserved}`, 'reserved in targeted or salted attributes');
        }
    }
    const block: Attributes = { d: '' };
    if (salted) {
        block.u = params.salt ?? newSalt();
    }
    if (recipient !== undefined) {
        if (recipient.length === 0) {
            throw err.InvalidField('a.i', 'recipient must not be empty');
        }
        block.i = recipient;
    }
    Object.assign(block, attributes);

    return inline(saidify(block, { label: 'd', kind, code }).sad);
}

function buildEdges(edges: Record<string, EdgeRef> | string): Block<Edges> {
    if (typeof edges === 'string') {
        if (!isSaid(edges)) {
            throw err.InvalidField('e', 'compact edges must be a well-formed SAID');
        }
        return compacted(edges);
    }
    if ('d' in edges) {
        throw err.InvalidField('e.d', 'edge label d is reserved');
    }

    const checked: Record<string, EdgeRef> = {};
    for (const [label, edge] of Object.entries(edges)) {
        checked[label] = parseEdge(label, edgeToJson(edge));
    }
    return inline({ edges: checked });
}

function buildRules(rules: Rules | string): Block<Rules> {
    if (typeof rules === 'string') {
        if (!isSaid(rules)) {
            throw err.InvalidField('r', 'compact rules must be a well-formed SAID');
        }
        return compacted(rules);
    }
    if (!isJsonObject(rules)) {
        throw err.InvalidField('r', 'rules must be a mapping or a SAID');
    }
    assertJson(rules, 'r');
    return inline(rules);
}

function edgeToJson(edge: EdgeRef): JsonValue {
    if (!isJsonObject(edge)) {
        return null;
    }
    const json: JsonObject = {};
    for (const [key, value] of Object.entries(edge)) {
        if (value !== undefined) {
            json[key] = value;
        }
    }
    return json;
}

export interface EncodeOptions {
    kind?: Kind;
    code?: DigestCode;
}

/**
 * Recompute a container's identifier over its current representation
 */
export function finalize(container: Container, options: EncodeOptions = {}): Container {
    const kind = options.kind ?? container.version.kind;
    const code = options.code ?? codeOf(container);

    const identified = computeIdentifier(toSad(container), {
        kind,
        code,
        version: container.version.version,
    });

    return {
        ...container,
        version: { ...container.version, kind, size: identified.raw.length },
        said: identified.said,
    };
}

/**
 * Encode a container, computing its identifier and size
 *
 * Defaults to the container's own kind and digest code.
 */
export function encode(container: Container, kind?: Kind, code?: DigestCode): Uint8Array {
    const finalized = finalize(container, { kind, code });
    return serializeContainer(finalized);
}

/**
 * Encode a JSON container as text
 */
export function encodeText(container: Container, code?: DigestCode): string {
    return bytesToText(encode(container, Kind.JSON, code));
}

/**
 * Serialize a container exactly as it stands, without recomputing anything
 */
export function serializeContainer(container: Container): Uint8Array {
    return serialize(toSad(container), container.version.kind);
}

/**
 * Wire field map in canonical label order
 */
export function toSad(container: Container): JsonObject {
    const { version } = container;
    const sad: JsonObject = {
        v: versify(version.protocol, version.version, version.kind, version.size),
        d: container.said,
        i: container.issuer,
        ri: container.registry,
        s: container.schema,
    };

    if (container.attributes) {
        sad.a = container.attributes.kind === 'compact' ? container.attributes.said : container.attributes.data;
    }
    if (container.edges) {
        sad.e = container.edges.kind === 'compact' ? container.edges.said : edgesToWire(container.edges.data);
    }
    if (container.rules) {
        sad.r = container.rules.kind === 'compact' ? container.rules.said : container.rules.data;
    }

    return sad;
}

/**
 * Build a container from a decoded wire field map
 */
export function fromSad(sad: JsonObject): Container {
    assertLabelOrder(sad);

    const { v, d, i, ri, s: schema, a, e, r } = sad;
    if (typeof v !== 'string') {
        throw err.MalformedHeader(`'v' must be a string`);
    }
    const version: VersionHeader = deversify(v);

    if (typeof d !== 'string') throw err.InvalidField('d', 'identifier must be a string');
    if (typeof i !== 'string') throw err.InvalidField('i', 'issuer must be a string');
    if (typeof ri !== 'string') throw err.InvalidField('ri', 'registry must be a string');
    if (typeof schema !== 'string' || schema.length === 0) {
        throw err.InvalidField('s', 'schema must be a non-empty string');
    }

    return {
        version,
        said: s(d).asSAID(),
        issuer: i,
        registry: ri,
        schema,
        attributes: a === undefined ? undefined : wireBlock('a', a, value => value),
        edges: e === undefined ? undefined : wireBlock('e', e, edgesFromWire),
        rules: r === undefined ? undefined : wireBlock('r', r, value => value),
    };
}

function wireBlock<T>(label: string, value: JsonValue, parse: (data: JsonObject) => T): Block<T> {
    if (typeof value === 'string') {
        if (!isSaid(value)) {
            throw err.InvalidField(label, 'compact block must be a well-formed SAID');
        }
        return compacted(value);
    }
    if (!isJsonObject(value)) {
        throw err.InvalidField(label, 'block must be a mapping or a SAID');
    }
    return inline(parse(value));
}

/**
 * Decode a container from raw bytes or JSON text
 *
 * Decoding does not verify the identifier; use verify or verifyRaw.
 *
 * @throws AcdcError MalformedHeader, UnsupportedKind or InvalidField
 */
export function decode(input: Uint8Array | string): Container {
    const raw = typeof input === 'string' ? textToBytes(input) : input;
    const header = sniff(raw);
    return fromSad(deserialize(raw, header.kind));
}

/** Alias of decode */
export const parse = decode;

export function tryDecode(input: Uint8Array | string): Result<Container> {
    try {
        return ok(decode(input));
    } catch (error) {
        if (isAcdcError(error)) {
            return fail(error);
        }
        throw error;
    }
}

/**
 * Check a container against its own identifier
 *
 * Serializes the container as it stands, with its stored size and SAID.
 * Any changed field, size or identifier makes this false.
 */
export function verify(container: Container): boolean {
    let raw: Uint8Array;
    try {
        raw = serializeContainer(container);
    } catch (error) {
        if (isAcdcError(error)) {
            return false;
        }
        throw error;
    }
    return verifyRaw(raw).ok;
}

/**
 * Check raw bytes against their own identifier, with the failure reason
 */
export function verifyRaw(input: Uint8Array | string): Result<SAID> {
    const raw = typeof input === 'string' ? textToBytes(input) : input;
    const result = verifyIdentifier(raw);
    if (!result.ok) {
        return result;
    }
    try {
        fromSad(result.data.sad);
    } catch (error) {
        if (isAcdcError(error)) {
            return fail(error);
        }
        throw error;
    }
    return ok(result.data.said);
}

export function getIssuer(container: Container): string {
    return container.issuer;
}

export function getSchema(container: Container): string {
    return container.schema;
}

export function getRegistry(container: Container): string {
    return container.registry;
}

/**
 * Inline attributes of a container
 *
 * @param expansion - Full attribute block, needed when the block is compact
 * @throws AcdcError CompactOnly when compact and no expansion is given,
 *   ExpansionMismatch when the expansion does not match the compact SAID
 */
export function getAttributes(container: Container, expansion?: Attributes): Attributes | undefined {
    const block = container.attributes;
    if (block === undefined) {
        return undefined;
    }
    if (block.kind === 'inline') {
        return block.data;
    }
    if (expansion === undefined) {
        throw err.CompactOnly('a');
    }
    if (!matchesBlock(expansion, block.said, { kind: container.version.kind, code: codeOf(container) })) {
        throw err.ExpansionMismatch('a');
    }
    return expansion;
}

/**
 * Digest code of a container's identifier, or the configured default
 */
export function codeOf(container: Container): DigestCode {
    const code = digestCodeOf(container.said);
    return isDigestCode(code) ? code : loadConfig().code;
}
