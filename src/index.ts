/**
 * ACDC - Authentic Chained Data Containers
 *
 * Self-addressing, schema-bound data containers: multi-format encoding with
 * a self-describing version header, SAID computation and verification,
 * selective disclosure by block compaction, and chain validation over edges.
 */

export * from './types';
export { AcdcError, isAcdcError, err, type AcdcErrorCode } from './errors';
export { loadConfig, defaultConfig, type AcdcConfig } from './config';

// Version header and serialization
export * from './versify';
export { serialize, deserialize, LABELS, type Label } from './serder';

// SAID
export {
    computeIdentifier,
    verifyIdentifier,
    saidify,
    verifySaidified,
    placeholder,
    type SaidifyOptions,
    type IdentifierOptions,
    type Identified,
    type Verified,
} from './saidify';

// CESR primitives
export * from './cesr';

// Containers
export * from './acdc';

// Schemas
export * from './schemas';

// Resolvers
export {
    MemoryResolver,
    MemorySchemaResolver,
    type ContainerResolver,
    type SchemaResolver,
} from './model/io/resolver';
