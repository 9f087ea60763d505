/**
 * ACDC error taxonomy
 *
 * Every failure the core detects is an AcdcError carrying one of these codes.
 * Nothing is recovered silently: callers either catch the error or receive it
 * inside a Result.
 */

export type AcdcErrorCode =
    | 'MalformedHeader'
    | 'UnsupportedKind'
    | 'SizeMismatch'
    | 'UnknownAlgorithm'
    | 'DigestMismatch'
    | 'InvalidField'
    | 'CompactOnly'
    | 'ExpansionMismatch'
    | 'CycleDetected'
    | 'NotFound'
    | 'SchemaConstraintFailed'
    | 'NegatedEdgeValid'
    | 'SchemaInvalid'
    | 'HeaderSizeOverflow'
    | 'InternalError';

export class AcdcError extends Error {
    readonly code: AcdcErrorCode;

    constructor(code: AcdcErrorCode, msg?: string) {
        super(msg ?? code);
        this.name = 'AcdcError';
        this.code = code;
    }
}

export function isAcdcError(value: unknown): value is AcdcError {
    return value instanceof AcdcError;
}

export const err = {
    MalformedHeader: (detail: string) => new AcdcError('MalformedHeader', `Malformed version header: ${detail}`),
    UnsupportedKind: (kind: string) => new AcdcError('UnsupportedKind', `Unsupported serialization kind '${kind}'`),
    SizeMismatch: (declared: number, actual: number) =>
        new AcdcError('SizeMismatch', `Declared size ${declared} does not match actual size ${actual}`),
    UnknownAlgorithm: (said: string) => new AcdcError('UnknownAlgorithm', `Unknown digest code in '${said}'`),
    DigestMismatch: (said: string) => new AcdcError('DigestMismatch', `Digest does not match identifier ${said}`),
    InvalidField: (field: string, reason: string) => new AcdcError('InvalidField', `Invalid field '${field}': ${reason}`),
    CompactOnly: (label: string) => new AcdcError('CompactOnly', `Block '${label}' is compact and no expansion was provided`),
    ExpansionMismatch: (label: string) =>
        new AcdcError('ExpansionMismatch', `Expansion of block '${label}' does not match its identifier`),
    CycleDetected: (said: string) => new AcdcError('CycleDetected', `Cycle detected at ${said}`),
    NotFound: (said: string) => new AcdcError('NotFound', `Container ${said} could not be resolved`),
    SchemaConstraintFailed: (expected: string, actual: string) =>
        new AcdcError('SchemaConstraintFailed', `Expected schema ${expected}, got ${actual}`),
    NegatedEdgeValid: (label: string, said: string) =>
        new AcdcError('NegatedEdgeValid', `NOT edge '${label}' references valid container ${said}`),
    SchemaInvalid: (said: string, reason: string) => new AcdcError('SchemaInvalid', `Attributes of ${said} fail schema: ${reason}`),
    HeaderSizeOverflow: (size: number) =>
        new AcdcError('HeaderSizeOverflow', `Size ${size} does not fit the version header size field`),
    Internal: (msg: string) => new AcdcError('InternalError', msg),
};
