/**
 * ACDC container model, compaction and chain validation
 */

export * from './types';
export {
    build,
    newContainer,
    finalize,
    encode,
    encodeText,
    serializeContainer,
    toSad,
    fromSad,
    decode,
    parse,
    tryDecode,
    verify,
    verifyRaw,
    getIssuer,
    getSchema,
    getRegistry,
    getAttributes,
    codeOf,
    type EncodeOptions,
} from './container';
export { compactBlock, saidifyBlock, edgesFromWire, edgesToWire, isSaid, type BlockOptions } from './blocks';
export { compact, compactAll, compactLabels, expand, expandBlock } from './compaction';
export {
    validateChain,
    type ChainFailure,
    type ChainValidationOptions,
    type ChainValidationResult,
} from './chain';
