/**
 * Schema types for ACDC
 *
 * Uses standard JSON Schema types from @types/json-schema, with the
 * requirement that $id is the SAID of the schema document itself.
 */

import type { JSONSchema7 } from 'json-schema';

/**
 * ACDC Schema - JSON Schema with SAID $id
 *
 * A container's 's' field references a schema by this SAID, so a schema
 * cannot change without changing every reference to it.
 */
export interface AcdcSchema extends Omit<JSONSchema7, '$id' | '$schema'> {
  /**
   * Schema identifier - MUST be the SAID of this schema document
   *
   * Format: Base64URL-encoded digest with a CESR code prefix, e.g. 'E' for Blake3-256
   */
  $id: string;

  /**
   * JSON Schema dialect, typically "https://json-schema.org/draft/2020-12/schema"
   */
  $schema?: string;
}

/**
 * Schema validation result
 */
export interface SchemaValidationResult {
  valid: boolean;
  errors?: Array<{
    path: string;
    message: string;
    keyword?: string;
  }>;
}
