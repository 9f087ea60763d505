/**
 * Compaction - selective disclosure of container blocks
 *
 * Attribute, edge and rule blocks can be swapped for their own SAID and
 * swapped back later. An expansion is only accepted when it digests to the
 * SAID it replaces.
 */

import { err } from '../errors';
import { isJsonObject, type JsonObject, type SAID } from '../types';
import { compactBlock, edgesFromWire, edgesToWire, matchesBlock, saidifyBlock, type BlockOptions } from './blocks';
import { codeOf, finalize } from './container';
import { compacted, inline, type BlockLabel, type Container } from './types';

const BLOCK_LABELS: ReadonlyArray<BlockLabel> = ['a', 'e', 'r'];

export { compactBlock, saidifyBlock };

function optionsOf(container: Container): BlockOptions {
    return { kind: container.version.kind, code: codeOf(container) };
}

/**
 * Wire form of an inline block, or its SAID when already compact
 */
function blockState(container: Container, label: BlockLabel): { said: SAID } | { wire: JsonObject } | undefined {
    switch (label) {
        case 'a': {
            const block = container.attributes;
            if (!block) return undefined;
            return block.kind === 'compact' ? { said: block.said } : { wire: block.data };
        }
        case 'e': {
            const block = container.edges;
            if (!block) return undefined;
            return block.kind === 'compact' ? { said: block.said } : { wire: edgesToWire(block.data) };
        }
        case 'r': {
            const block = container.rules;
            if (!block) return undefined;
            return block.kind === 'compact' ? { said: block.said } : { wire: block.data };
        }
    }
}

/**
 * SAID of an inline block's wire form
 *
 * @throws AcdcError InvalidField when the block carries a 'd' that is not its SAID
 */
function wireSaid(label: BlockLabel, wire: JsonObject, options: BlockOptions): SAID {
    const said = compactBlock(wire, options);
    if ('d' in wire && wire.d !== said) {
        throw err.InvalidField(`${label}.d`, 'block SAID does not match its content');
    }
    return said;
}

function withBlock(container: Container, label: BlockLabel, value: SAID | JsonObject): Container {
    switch (label) {
        case 'a':
            return { ...container, attributes: typeof value === 'string' ? compacted(value) : inline(value) };
        case 'e':
            return { ...container, edges: typeof value === 'string' ? compacted(value) : inline(edgesFromWire(value)) };
        case 'r':
            return { ...container, rules: typeof value === 'string' ? compacted(value) : inline(value) };
    }
}

/**
 * Replace an inline block by its SAID and recompute the container identifier
 *
 * A block that is absent or already compact leaves the container unchanged.
 *
 * @throws AcdcError InvalidField when the block carries a 'd' that is not its SAID
 */
export function compact(container: Container, label: BlockLabel): Container {
    const state = blockState(container, label);
    if (state === undefined || 'said' in state) {
        return container;
    }
    const said = wireSaid(label, state.wire, optionsOf(container));
    return finalize(withBlock(container, label, said));
}

/**
 * Most compact form: every inline block replaced by its SAID
 */
export function compactAll(container: Container): Container {
    let current = container;
    let changed = false;
    for (const label of BLOCK_LABELS) {
        const state = blockState(current, label);
        if (state !== undefined && 'wire' in state) {
            current = withBlock(current, label, wireSaid(label, state.wire, optionsOf(container)));
            changed = true;
        }
    }
    return changed ? finalize(current) : container;
}

/**
 * Put a block's full data back in place of its SAID and recompute the
 * container identifier
 *
 * @param fullBlockData - Wire form of the block (edge blocks as label → { n, s?, o? })
 * @throws AcdcError ExpansionMismatch when the data does not digest to the
 *   block's SAID, carries a 'd' other than that SAID, or the container has
 *   no such block
 */
export function expand(container: Container, label: BlockLabel, fullBlockData: JsonObject): Container {
    if (!isJsonObject(fullBlockData)) {
        throw err.ExpansionMismatch(label);
    }

    const state = blockState(container, label);
    if (state === undefined) {
        throw err.ExpansionMismatch(label);
    }

    const options = optionsOf(container);
    const expected = 'said' in state ? state.said : wireSaid(label, state.wire, options);
    if (!matchesBlock(fullBlockData, expected, options)) {
        throw err.ExpansionMismatch(label);
    }
    if ('wire' in state) {
        return container;
    }

    return finalize(withBlock(container, label, fullBlockData));
}

/** Alias of expand */
export const expandBlock = expand;

/**
 * Labels of the blocks currently held compact
 */
export function compactLabels(container: Container): BlockLabel[] {
    return BLOCK_LABELS.filter(label => {
        const state = blockState(container, label);
        return state !== undefined && 'said' in state;
    });
}
