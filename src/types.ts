/**
 * Core ACDC Type Definitions
 *
 * Branded identifier types and the result shape shared by the codec,
 * the compaction engine and the chain validator.
 */

import type { AcdcError } from './errors';

/**
 * SAID - Self-Addressing IDentifier
 *
 * A cryptographic digest of the data it identifies, embedded in that data.
 * Branded so it cannot be mixed up with an arbitrary string.
 */
export type SAID = string & { readonly __brand: 'SAID' };

/**
 * JSON value carried inside attribute and rule blocks
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Result<T> = Readonly<{
    ok: true; data: T;
}> | Readonly<{
    ok: false; error: AcdcError;
}>;

export const ok = <T>(data: T): Result<T> => ({ ok: true, data });
export const fail = (error: AcdcError): Result<never> => ({ ok: false, error });

export function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

/**
 * String operations helper for branded type conversions
 *
 * Usage: s('someHash').asSAID()
 */
export function s(str: string) {
    return {
        asSAID: (): SAID => str as SAID,
    };
}
