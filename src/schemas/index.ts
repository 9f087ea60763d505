/**
 * ACDC Schema Module
 *
 * - JSON Schema support (via AJV)
 * - SAID-based schema identifiers (RFC 8785 JCS canonicalization)
 * - Validation of container attribute blocks
 *
 * @example
 * ```ts
 * import { saidifySchema, validateAgainstSchema } from './schemas';
 *
 * const schema = saidifySchema({
 *   $schema: 'https://json-schema.org/draft/2020-12/schema',
 *   title: 'Membership',
 *   type: 'object',
 *   properties: { member: { type: 'string' } },
 *   required: ['member'],
 * });
 *
 * validateAgainstSchema(schema, { member: 'alice' }).valid; // true
 * ```
 */

// Types
export type { AcdcSchema, SchemaValidationResult } from './types';

// SAID operations
export { deriveSchemaSaid, saidifySchema, verifySchemaSaid } from './said';

// Validation
export {
  createSchemaValidator,
  validateAgainstSchema,
  validateAttributes,
  validateBatch,
  type ValidateOptions,
} from './validator';
