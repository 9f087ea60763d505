/**
 * Resolvers - look up referenced containers and schemas by SAID
 *
 * Resolution is "get by identifier → document"; the adapter decides the
 * transport (HTTP, database, memory cache, etc.). The core never fetches
 * anything itself.
 */

import { decode } from '../../acdc/container';
import { textToBytes } from '../../cesr/utils';
import type { AcdcSchema } from '../../schemas/types';
import type { SAID } from '../../types';

export type Bytes = Uint8Array;

export interface ContainerResolver {
    /** Resolve a container's encoded bytes (or JSON text) by its SAID, null when unknown */
    resolve(said: string): Promise<Bytes | string | null>;
}

export interface SchemaResolver {
    /** Resolve a schema document by its SAID, null when unknown */
    resolve(said: string): Promise<AcdcSchema | null>;
}

/**
 * In-memory container resolver
 */
export class MemoryResolver implements ContainerResolver {
    private containers = new Map<string, Bytes>();

    /**
     * Index an encoded container under its own 'd'
     *
     * The bytes are stored as given; nothing is verified until resolution.
     */
    add(raw: Bytes | string): SAID {
        const bytes = typeof raw === 'string' ? textToBytes(raw) : raw;
        const said = decode(bytes).said;
        this.containers.set(said, bytes);
        return said;
    }

    /** Store bytes under an arbitrary key */
    set(said: string, raw: Bytes | string): void {
        this.containers.set(said, typeof raw === 'string' ? textToBytes(raw) : raw);
    }

    delete(said: string): boolean {
        return this.containers.delete(said);
    }

    has(said: string): boolean {
        return this.containers.has(said);
    }

    get size(): number {
        return this.containers.size;
    }

    async resolve(said: string): Promise<Bytes | null> {
        return this.containers.get(said) ?? null;
    }
}

/**
 * In-memory schema resolver keyed by each schema's $id
 */
export class MemorySchemaResolver implements SchemaResolver {
    private schemas = new Map<string, AcdcSchema>();

    add(schema: AcdcSchema): void {
        this.schemas.set(schema.$id, schema);
    }

    async resolve(said: string): Promise<AcdcSchema | null> {
        return this.schemas.get(said) ?? null;
    }
}
