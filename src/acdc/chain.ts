/**
 * Chain validation
 *
 * Verifies a container together with every container it references through
 * its edges, recursively. Referenced containers come from a caller-supplied
 * resolver; nothing is fetched here.
 *
 * Sibling edges combine by operator:
 * - AND (default): every edge must validate
 * - OR: at least one edge in the group must validate
 * - NOT: the edge must fail to validate or be unresolvable
 *
 * A cycle anywhere below the root fails the whole chain.
 */

import { AcdcError, err, isAcdcError, type AcdcErrorCode } from '../errors';
import type { ContainerResolver, SchemaResolver } from '../model/io/resolver';
import { validateAttributes } from '../schemas/validator';
import type { AcdcSchema } from '../schemas/types';
import { fail, ok, type Result, type SAID } from '../types';
import { decode, serializeContainer, verifyRaw } from './container';
import type { Container, EdgeRef } from './types';

export interface ChainValidationOptions {
    /** Validate each inline attribute block against its resolved schema */
    schemas?: SchemaResolver;
}

export interface ChainFailure {
    code: AcdcErrorCode;
    message: string;
    /** Identifier of the container (or schema) the failure concerns */
    said: string;
}

export interface ChainValidationResult {
    valid: boolean;
    /** Identifier of the root container */
    said: SAID;
    error?: ChainFailure;
}

type Outcome =
    | { ok: true }
    | { ok: false; error: AcdcError; said: string };

const PASS: Outcome = { ok: true };

function failed(error: AcdcError, said: string): Outcome {
    return { ok: false, error, said };
}

function isFatal(outcome: Outcome): boolean {
    return !outcome.ok && outcome.error.code === 'CycleDetected';
}

/**
 * Validate a container and its transitive edges
 *
 * Resolver calls run one at a time, so a failing AND edge or a passing OR
 * edge stops further resolution in its group.
 */
export async function validateChain(
    container: Container,
    resolver: ContainerResolver,
    options: ChainValidationOptions = {}
): Promise<ChainValidationResult> {
    const root = verifyContainer(container);
    if (!root.ok) {
        return report(container.said, failed(root.error, container.said));
    }

    const walker = new ChainWalker(resolver, options);
    const outcome = await walker.node(container, new Set([container.said]));
    return report(container.said, outcome);
}

function report(said: SAID, outcome: Outcome): ChainValidationResult {
    if (outcome.ok) {
        return { valid: true, said };
    }
    return {
        valid: false,
        said,
        error: { code: outcome.error.code, message: outcome.error.message, said: outcome.said },
    };
}

function verifyContainer(container: Container): Result<SAID> {
    let raw: Uint8Array;
    try {
        raw = serializeContainer(container);
    } catch (error) {
        if (isAcdcError(error)) {
            return fail(error);
        }
        throw error;
    }
    return verifyRaw(raw);
}

class ChainWalker {
    /** Outcome of each verified node's own subtree, keyed by SAID */
    private readonly validated = new Map<string, { outcome: Outcome; schema: string }>();

    constructor(
        private readonly resolver: ContainerResolver,
        private readonly options: ChainValidationOptions
    ) {}

    /**
     * Validate an already verified container's schema and edges
     *
     * @param path - Identifiers on the path from the root, this one included
     */
    async node(container: Container, path: ReadonlySet<string>): Promise<Outcome> {
        const schemaOutcome = await this.checkSchema(container);
        if (!schemaOutcome.ok) {
            return schemaOutcome;
        }

        const block = container.edges;
        if (block === undefined) {
            return PASS;
        }
        if (block.kind === 'compact') {
            return failed(err.CompactOnly('e'), container.said);
        }

        const and: Array<[string, EdgeRef]> = [];
        const or: Array<[string, EdgeRef]> = [];
        const not: Array<[string, EdgeRef]> = [];
        for (const entry of Object.entries(block.data.edges)) {
            const op = entry[1].o ?? 'AND';
            (op === 'OR' ? or : op === 'NOT' ? not : and).push(entry);
        }

        for (const [, edge] of and) {
            const outcome = await this.edge(edge, path);
            if (!outcome.ok) {
                return outcome;
            }
        }

        for (const [label, edge] of not) {
            const outcome = await this.edge(edge, path);
            if (isFatal(outcome)) {
                return outcome;
            }
            if (outcome.ok) {
                return failed(err.NegatedEdgeValid(label, edge.n), container.said);
            }
        }

        if (or.length > 0) {
            let firstFailure: Outcome | undefined;
            for (const [, edge] of or) {
                const outcome = await this.edge(edge, path);
                if (outcome.ok) {
                    return PASS;
                }
                if (isFatal(outcome)) {
                    return outcome;
                }
                firstFailure ??= outcome;
            }
            return firstFailure ?? PASS;
        }

        return PASS;
    }

    /**
     * Resolve, verify and recursively validate one edge's target
     */
    private async edge(edge: EdgeRef, path: ReadonlySet<string>): Promise<Outcome> {
        const said = edge.n;
        if (path.has(said)) {
            return failed(err.CycleDetected(said), said);
        }

        const known = this.validated.get(said);
        if (known !== undefined) {
            return this.constrain(edge, known.schema) ?? known.outcome;
        }

        const resolved = await this.resolveTarget(said);
        if (!resolved.ok) {
            return failed(resolved.error, said);
        }
        const target = resolved.data;
        const mismatch = this.constrain(edge, target.schema);
        if (mismatch !== undefined) {
            return mismatch;
        }

        const outcome = await this.node(target, new Set([...path, said]));
        if (!isFatal(outcome)) {
            this.validated.set(said, { outcome, schema: target.schema });
        }
        return outcome;
    }

    private constrain(edge: EdgeRef, schema: string): Outcome | undefined {
        if (edge.s !== undefined && edge.s !== schema) {
            return failed(err.SchemaConstraintFailed(edge.s, schema), edge.n);
        }
        return undefined;
    }

    private async resolveTarget(said: SAID): Promise<Result<Container>> {
        let raw: Uint8Array | string | null;
        try {
            raw = await this.resolver.resolve(said);
        } catch (error) {
            console.warn(`Failed to resolve container ${said}:`, error);
            return fail(err.NotFound(said));
        }
        if (raw === null) {
            return fail(err.NotFound(said));
        }

        const verified = verifyRaw(raw);
        if (!verified.ok) {
            return verified;
        }
        if (verified.data !== said) {
            return fail(err.DigestMismatch(said));
        }

        return ok(decode(raw));
    }

    private async checkSchema(container: Container): Promise<Outcome> {
        const schemas = this.options.schemas;
        const block = container.attributes;
        if (schemas === undefined || block === undefined || block.kind === 'compact') {
            return PASS;
        }

        let schema: AcdcSchema | null;
        try {
            schema = await schemas.resolve(container.schema);
        } catch (error) {
            console.warn(`Failed to resolve schema ${container.schema}:`, error);
            return failed(err.NotFound(container.schema), container.schema);
        }
        if (schema === null) {
            return failed(err.NotFound(container.schema), container.schema);
        }

        const result = validateAttributes(container, schema);
        return result.ok ? PASS : failed(result.error, container.said);
    }
}
